export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

/** OpenAI-style error body. */
export interface ErrorBody {
  error: {
    message: string;
    type: string;
  };
}

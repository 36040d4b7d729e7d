import { describe, expect, it } from "vitest";

import type { AdapterDiagnostic } from "../../core/diagnostics";
import type { ReplacementRule } from "../../core/types";
import { CaptureContext } from "../../rules/capture-context";
import {
  applyRules,
  hasRulesFor,
  rewriteMessages,
} from "../../rules/rule-engine";

const greetingRules: ReplacementRule[] = [
  { role: "user", pattern: "ID:(?P<user_id>\\d+)" },
  {
    role: "completion",
    trigger: "user_id",
    ref: ["user"],
    pattern: "Hello",
    replacement: "Hello #{user_id}!",
  },
];

describe("applyRules", () => {
  it("substitutes a capture made by an earlier user message", () => {
    const context = new CaptureContext();
    rewriteMessages([{ role: "user", content: "ID:42" }], {
      rules: greetingRules,
      context,
    });

    expect(
      applyRules("Hello", "completion", { rules: greetingRules, context })
    ).toBe("Hello #42!");
  });

  it("leaves text untouched when the trigger was never captured", () => {
    const context = new CaptureContext();
    rewriteMessages([{ role: "user", content: "no identifier here" }], {
      rules: greetingRules,
      context,
    });

    expect(
      applyRules("Hello", "completion", { rules: greetingRules, context })
    ).toBe("Hello");
  });

  it("does not see captures of another request's context", () => {
    const first = new CaptureContext();
    rewriteMessages([{ role: "user", content: "ID:7" }], {
      rules: greetingRules,
      context: first,
    });

    const second = new CaptureContext();
    expect(
      applyRules("Hello", "completion", {
        rules: greetingRules,
        context: second,
      })
    ).toBe("Hello");
  });

  it("is idempotent for rules whose output no longer matches", () => {
    const rules: ReplacementRule[] = [
      { role: "assistant", pattern: "colour", replacement: "color" },
    ];
    const context = new CaptureContext();
    const once = applyRules("colour and colour", "assistant", {
      rules,
      context,
    });
    expect(once).toBe("color and color");
    expect(applyRules(once, "assistant", { rules, context })).toBe(once);
  });

  it("applies rules in declaration order", () => {
    const rules: ReplacementRule[] = [
      { role: "user", pattern: "a", replacement: "b" },
      { role: "user", pattern: "b", replacement: "c" },
    ];
    expect(
      applyRules("a", "user", { rules, context: new CaptureContext() })
    ).toBe("c");
  });

  it("translates numbered and named back-references", () => {
    const rules: ReplacementRule[] = [
      {
        role: "user",
        pattern: "(?P<first>\\w+) (\\w+)",
        replacement: "\\2 \\g<first>",
      },
    ];
    expect(
      applyRules("hello world", "user", {
        rules,
        context: new CaptureContext(),
      })
    ).toBe("world hello");
  });

  it("substitutes the whole match for group zero", () => {
    const context = new CaptureContext();
    const named: ReplacementRule[] = [
      { role: "completion", pattern: "foo", replacement: "[\\g<0>]" },
    ];
    const numbered: ReplacementRule[] = [
      { role: "completion", pattern: "foo", replacement: "<\\0>" },
    ];

    expect(applyRules("foo bar", "completion", { rules: named, context })).toBe(
      "[foo] bar"
    );
    expect(
      applyRules("foo bar", "completion", { rules: numbered, context })
    ).toBe("<foo> bar");
  });

  it("anchors \\A to the start of the text", () => {
    const rules: ReplacementRule[] = [
      { role: "user", pattern: "\\Ahello", replacement: "X" },
    ];
    const context = new CaptureContext();

    expect(applyRules("Ahello hello", "user", { rules, context })).toBe(
      "Ahello hello"
    );
    expect(applyRules("hello hello", "user", { rules, context })).toBe(
      "X hello"
    );
  });

  it("turns leading inline flags into RegExp flags", () => {
    const diagnostics: AdapterDiagnostic[] = [];
    const rules: ReplacementRule[] = [
      { role: "user", pattern: "(?i)hello", replacement: "hi" },
      { role: "user", pattern: "(?s)a.b", replacement: "ab" },
      { role: "user", pattern: "(?x) t h e re  # word", replacement: "here" },
    ];
    const options = {
      rules,
      context: new CaptureContext(),
      report: (diagnostic: AdapterDiagnostic) => diagnostics.push(diagnostic),
    };

    expect(applyRules("HELLO a\nb there", "user", options)).toBe(
      "hi ab here"
    );
    expect(diagnostics).toEqual([]);
  });

  it("keeps dollar signs in replacements literal", () => {
    const rules: ReplacementRule[] = [
      { role: "user", pattern: "price", replacement: "$1 off" },
    ];
    expect(
      applyRules("price", "user", { rules, context: new CaptureContext() })
    ).toBe("$1 off");
  });

  it("escapes captured values substituted into a pattern", () => {
    const rules: ReplacementRule[] = [
      { role: "user", pattern: "host=(?<host>\\S+)" },
      {
        role: "completion",
        ref: ["user"],
        pattern: "{host}",
        replacement: "[host]",
      },
    ];
    const context = new CaptureContext();
    rewriteMessages([{ role: "user", content: "host=a.b" }], {
      rules,
      context,
    });

    expect(applyRules("axb a.b", "completion", { rules, context })).toBe(
      "axb [host]"
    );
  });

  it("resolves unknown placeholders to the empty string", () => {
    const rules: ReplacementRule[] = [
      { role: "user", pattern: "ID:(?<id>\\d+)" },
      {
        role: "completion",
        ref: ["user"],
        pattern: "X",
        replacement: "{id}-{missing}-{{literal}}",
      },
    ];
    const context = new CaptureContext();
    rewriteMessages([{ role: "user", content: "ID:5" }], { rules, context });

    expect(applyRules("X", "completion", { rules, context })).toBe(
      "5--{literal}"
    );
  });

  it("reports an invalid pattern once and skips the rule", () => {
    const diagnostics: AdapterDiagnostic[] = [];
    const rules: ReplacementRule[] = [
      { name: "broken", role: "user", pattern: "(", replacement: "x" },
      { role: "user", pattern: "a", replacement: "b" },
    ];
    const context = new CaptureContext();
    const options = {
      rules,
      context,
      report: (diagnostic: AdapterDiagnostic) => diagnostics.push(diagnostic),
    };

    expect(applyRules("a(", "user", options)).toBe("b(");
    expect(applyRules("a(", "user", options)).toBe("b(");
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      kind: "invalid-rule-pattern",
      ruleName: "broken",
      role: "user",
      pattern: "(",
    });
  });
});

describe("rewriteMessages", () => {
  it("rewrites only text parts and keeps other parts", () => {
    const rules: ReplacementRule[] = [
      { role: "user", pattern: "secret", replacement: "[redacted]" },
    ];
    const image = { type: "image_url", image_url: { url: "data:," } };
    const [message] = rewriteMessages(
      [
        {
          role: "user",
          content: [{ type: "text", text: "my secret" }, image],
        },
      ],
      { rules, context: new CaptureContext() }
    );

    expect(message?.content).toEqual([
      { type: "text", text: "my [redacted]" },
      image,
    ]);
  });

  it("replaces the captures of an earlier message of the same role", () => {
    const context = new CaptureContext();
    rewriteMessages(
      [
        { role: "user", content: "ID:1" },
        { role: "user", content: "ID:2" },
      ],
      { rules: greetingRules, context }
    );

    expect(context.get("user", "user_id")).toBe("2");
  });

  it("forgets a capture when the latest message of that role has none", () => {
    const context = new CaptureContext();
    rewriteMessages(
      [
        { role: "user", content: "ID:1" },
        { role: "assistant", content: "ok" },
        { role: "user", content: "thanks" },
      ],
      { rules: greetingRules, context }
    );

    expect(context.get("user", "user_id")).toBeUndefined();
  });
});

describe("hasRulesFor", () => {
  it("detects rules for a role", () => {
    expect(hasRulesFor(greetingRules, "completion")).toBe(true);
    expect(hasRulesFor(greetingRules, "system")).toBe(false);
  });
});

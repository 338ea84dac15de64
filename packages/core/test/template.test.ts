import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { TemplateError } from "../src/errors.js";
import { DEFAULT_FIM_TEMPLATE } from "../src/prompt.js";
import { compileTemplate } from "../src/template.js";

describe("compileTemplate", () => {
  it("renders the default FIM template", () => {
    const tmpl = compileTemplate(DEFAULT_FIM_TEMPLATE);
    assert.equal(
      tmpl.render({ Prefix: "def f():", Suffix: "return 1" }),
      "<|fim_prefix|> def f(): <|fim_suffix|>return 1 <|fim_middle|>",
    );
    assert.deepEqual(tmpl.fields, ["Prefix", "Suffix"]);
  });

  it("allows spaces inside actions", () => {
    const tmpl = compileTemplate("<PRE>{{ .Prefix }}<SUF>{{  .Suffix  }}<MID>");
    assert.equal(tmpl.render({ Prefix: "a", Suffix: "b" }), "<PRE>a<SUF>b<MID>");
  });

  it("trim markers remove adjacent whitespace", () => {
    const tmpl = compileTemplate("a  \n {{- .Prefix -}} \n b");
    assert.equal(tmpl.render({ Prefix: "X" }), "aXb");
  });

  it("drops comments", () => {
    assert.equal(compileTemplate("x{{/* note */}}y").render({}), "xy");
  });

  it("keeps text without actions as is", () => {
    assert.equal(compileTemplate("plain }} text").render({}), "plain }} text");
  });

  it("lists each referenced field once, in order of first use", () => {
    const tmpl = compileTemplate("{{.Suffix}}{{.Language}}{{.Suffix}}{{.Prefix}}");
    assert.deepEqual(tmpl.fields, ["Suffix", "Language", "Prefix"]);
  });

  it("inserts values literally", () => {
    const tmpl = compileTemplate("{{.Prefix}}");
    assert.equal(tmpl.render({ Prefix: "{{.Suffix}} $& \\n" }), "{{.Suffix}} $& \\n");
  });

  it("reports an unclosed action with its line", () => {
    assert.throws(() => compileTemplate("a\nb {{.Prefix"), {
      name: "TemplateError",
      message: "template: line 2: unclosed action",
    });
  });

  it("reports an empty action", () => {
    assert.throws(() => compileTemplate("{{ }}"), {
      message: "template: line 1: missing value for command",
    });
  });

  it("reports unsupported actions", () => {
    assert.throws(() => compileTemplate("{{range .Prefix}}"), {
      message: 'template: line 1: unsupported action "range .Prefix"',
    });
  });

  it("reports unknown fields", () => {
    assert.throws(() => compileTemplate("\n\n{{.Cursor}}"), {
      message:
        "template: line 3: can't evaluate field Cursor; expected one of Prefix, Suffix, Language",
    });
  });

  it("reports an unclosed comment", () => {
    assert.throws(() => compileTemplate("{{/* oops}}"), TemplateError);
  });

  it("fails rendering when a referenced value is missing", () => {
    const tmpl = compileTemplate("{{.Language}}: {{.Prefix}}");
    assert.throws(() => tmpl.render({ Prefix: "x" }), {
      name: "TemplateError",
      message: "template: executing: no value for field Language",
    });
  });
});

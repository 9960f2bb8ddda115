import { describe, it, expect } from "vitest";
import { renderTemplates } from "./render-templates.js";
import { createDefaultBuildConfig } from "../types/config.js";
import type { IR } from "../types/pipeline.js";
import type { FileRecord } from "../types/files.js";
import { createFileRecord, createFileStore } from "../utils/create-file-store.js";

function makeIR(entries: Array<[string, string, unknown[]?]>): IR {
  return {
    config: createDefaultBuildConfig(),
    files: createFileStore(
      entries.map(([key, content, frontmatter]): [string, FileRecord] => [
        key,
        createFileRecord(content, frontmatter ?? []),
      ]),
    ),
  };
}

function read(ir: IR, key: string): string | undefined {
  return ir.files.get(key)?.content.toString();
}

describe("renderTemplates", () => {
  it("renders templates with their front matter and strips the extension", () => {
    const ir = makeIR([["index.html.hbs", "<h1>{{title}}</h1>", [{ title: "Home" }]]]);

    const result = renderTemplates()(ir);

    expect([...result.files.keys()]).toEqual(["index.html"]);
    expect(read(result, "index.html")).toBe("<h1>Home</h1>");
    expect(result.files.get("index.html")?.frontmatter).toEqual([{ title: "Home" }]);
  });

  it("exposes the output path to the template", () => {
    const ir = makeIR([["docs/page.md.hbs", "at {{path}}"]]);
    expect(read(renderTemplates()(ir), "docs/page.md")).toBe("at docs/page.md");
  });

  it("carries other files through untouched", () => {
    const ir = makeIR([
      ["style.css", "{{not a template}}"],
      ["a.txt.hbs", "{{upper name}}", [{ name: "kiln" }]],
    ]);

    const result = renderTemplates()(ir);

    expect(result.files.get("style.css")).toBe(ir.files.get("style.css"));
    expect(read(result, "a.txt")).toBe("KILN");
    expect(result.files.has("a.txt.hbs")).toBe(false);
  });

  it("ignores front matter that is not a mapping", () => {
    const ir = makeIR([["a.txt.hbs", "[{{title}}]", [["not", "a", "mapping"]]]]);
    expect(read(renderTemplates()(ir), "a.txt")).toBe("[]");
  });

  it("escapes HTML in values", () => {
    const ir = makeIR([["a.html.hbs", "{{title}}", [{ title: "<b>&</b>" }]]]);
    expect(read(renderTemplates()(ir), "a.html")).toBe("&lt;b&gt;&amp;&lt;/b&gt;");
  });

  it("supports the comparison helpers", () => {
    const ir = makeIR([
      ["a.txt.hbs", "{{#if (eq kind \"post\")}}post{{else}}page{{/if}}", [{ kind: "post" }]],
    ]);
    expect(read(renderTemplates()(ir), "a.txt")).toBe("post");
  });

  it("uses a custom extension and helpers", () => {
    const ir = makeIR([
      ["a.txt.tpl", "{{shout word}}", [{ word: "hi" }]],
      ["b.txt.hbs", "{{word}}"],
    ]);

    const stage = renderTemplates({
      extension: ".tpl",
      helpers: { shout: (value) => `${String(value)}!` },
    });
    const result = stage(ir);

    expect(read(result, "a.txt")).toBe("hi!");
    expect(read(result, "b.txt.hbs")).toBe("{{word}}");
  });

  it("does not render a file named only by the extension", () => {
    const ir = makeIR([[".hbs", "{{x}}"]]);
    expect([...renderTemplates()(ir).files.keys()]).toEqual([".hbs"]);
  });

  it("leaves the input IR unchanged", () => {
    const ir = makeIR([["a.txt.hbs", "x"]]);
    renderTemplates()(ir);
    expect([...ir.files.keys()]).toEqual(["a.txt.hbs"]);
  });
});

/**
 * Template rendering stage
 * Renders Handlebars templates in place, with each file's front matter as data
 */

import Handlebars from "handlebars";
import type { FileRecord, IR, Stage } from "../types/index.js";
import { createFileStore } from "../utils/create-file-store.js";

export interface RenderTemplatesOptions {
  // Suffix marking a file as a template (stripped from the output path)
  extension?: string;
  // Extra helpers, on top of the comparison and string helpers below
  helpers?: Record<string, Handlebars.HelperDelegate>;
}

function createEnvironment(
  helpers: Record<string, Handlebars.HelperDelegate>,
): typeof Handlebars {
  const env = Handlebars.create();

  // Comparison helpers
  env.registerHelper("eq", (a, b) => a === b);
  env.registerHelper("ne", (a, b) => a !== b);
  env.registerHelper("and", (a, b) => a && b);
  env.registerHelper("or", (a, b) => a || b);
  env.registerHelper("not", (a) => !a);

  // String helpers
  env.registerHelper("capitalize", (str) => {
    if (!str) return "";
    return String(str).charAt(0).toUpperCase() + String(str).slice(1);
  });
  env.registerHelper("upper", (str) => (str ? String(str).toUpperCase() : ""));

  for (const [name, helper] of Object.entries(helpers)) {
    env.registerHelper(name, helper);
  }

  return env;
}

/**
 * Data a template sees: its first front-matter document (when that is an
 * object), plus `path`, the key the rendered file is written under
 */
function templateContext(
  file: FileRecord,
  outputPath: string,
): Record<string, unknown> {
  const [first] = file.frontmatter;
  const data =
    typeof first === "object" && first !== null && !Array.isArray(first)
      ? { ...first }
      : {};
  return { ...data, path: outputPath };
}

/**
 * Create a stage that renders every `*.hbs` file (or the configured
 * extension) and stores the result without the extension. The template
 * entries are dropped; every other file is carried through.
 *
 * @example
 * kiln.register(renderTemplates());
 * // "index.html.hbs" ("---\ntitle: Home\n---\n<h1>{{title}}</h1>")
 * // is written as "index.html" ("<h1>Home</h1>")
 */
export function renderTemplates(options: RenderTemplatesOptions = {}): Stage {
  const extension = options.extension ?? ".hbs";
  const env = createEnvironment(options.helpers ?? {});

  return function render(ir: IR): IR {
    const templates = ir.files.filter(
      (_, key) => key.endsWith(extension) && key.length > extension.length,
    );

    const rendered = createFileStore(
      templates.toArray().map(([key, file]): [string, FileRecord] => {
        const outputPath = key.slice(0, -extension.length);
        const template = env.compile(file.content.toString("utf-8"));
        const output = template(templateContext(file, outputPath));
        return [
          outputPath,
          { frontmatter: file.frontmatter, content: Buffer.from(output, "utf-8") },
        ];
      }),
    );

    const files = ir.files
      .deleteAll(templates.keys())
      .merge(rendered);

    return { ...ir, files };
  };
}

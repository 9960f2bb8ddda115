/**
 * Bundled stages
 */

export { renderTemplates } from "./render-templates.js";
export type { RenderTemplatesOptions } from "./render-templates.js";

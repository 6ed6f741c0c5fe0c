import * as nunjucks from "nunjucks";
import { warnOnce } from "./logging";

// Prompts are plain text; HTML escaping would mangle JSON and quotes.
const nunjucksEnv = new nunjucks.Environment(undefined, { autoescape: false });
nunjucksEnv.addFilter("tojson", (value: unknown) => JSON.stringify(value));

/** Top-level names a template reads that neither the context nor the template itself defines. */
export function undefinedTemplateVars(template: string, vars: Record<string, unknown>): string[] {
  const local = new Set<string>();
  for (const match of template.matchAll(/{%-?\s*(?:for|set)\s+([A-Za-z_]\w*)/g)) local.add(match[1]);

  const missing = new Set<string>();
  for (const match of template.matchAll(/{{-?\s*([A-Za-z_]\w*)/g)) {
    const name = match[1];
    if (!local.has(name) && !(name in vars)) missing.add(name);
  }
  return [...missing];
}

export function renderTemplate(template: string, vars: Record<string, unknown>, source = "template"): string {
  for (const name of undefinedTemplateVars(template, vars)) {
    warnOnce(`${source}:${name}`, `Template ${source} references undefined variable "${name}"`);
  }
  return nunjucksEnv.renderString(template, vars);
}

import nunjucks from "nunjucks";
import { TemplateError, describeError } from "./errors.js";
import type { RenderContext } from "./types.js";

export interface TemplateRenderer {
  render(templateName: string, context: RenderContext): string;
}

/**
 * Templates are resolved under `templateDirectory`. Referencing an undefined
 * value inside a template is an error rather than an empty string.
 */
export function createTemplateRenderer(templateDirectory: string): TemplateRenderer {
  const environment = new nunjucks.Environment(
    new nunjucks.FileSystemLoader(templateDirectory, { noCache: true }),
    { autoescape: false, throwOnUndefined: true }
  );

  return {
    render(templateName, context) {
      try {
        return environment.render(templateName, context);
      } catch (error) {
        throw new TemplateError(
          templateName,
          `Failed to render template ${templateName}: ${describeError(error)}`,
          { cause: error }
        );
      }
    },
  };
}

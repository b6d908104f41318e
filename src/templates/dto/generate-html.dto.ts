import { z } from 'zod';
import { ZodValidationPipe } from '../../common/zod-validation.pipe';
import type { RenderContext } from '../template.interface';

/**
 * Values must already be strings; numbers, booleans and objects are rejected
 */
export const RenderContextSchema = z.record(z.string());

/**
 * Used verbatim as the lookup key, so surrounding whitespace is not stripped
 */
export const TemplateNameSchema = z.string().min(1, 'template_name is required');

export const GenerateHtmlBodySchema = z.object({
  template_name: TemplateNameSchema,
  context: RenderContextSchema.default({}),
});

export interface GenerateHtmlRequest {
  templateName: string;
  context: RenderContext;
}

export interface GenerateHtmlResponse {
  html_content: string;
}

const contextPipe = new ZodValidationPipe(RenderContextSchema);
const bodyPipe = new ZodValidationPipe(GenerateHtmlBodySchema);

/**
 * Accepts either form:
 * - `?template_name=welcome.html` with the body being the context map
 * - a body of `{ "template_name": "welcome.html", "context": { ... } }`
 *
 * @throws BadRequestException when neither form validates
 */
export function parseGenerateHtmlRequest(
  query: Record<string, unknown>,
  body: unknown,
): GenerateHtmlRequest {
  const fromQuery = TemplateNameSchema.safeParse(query.template_name);

  if (fromQuery.success) {
    return {
      templateName: fromQuery.data,
      context: contextPipe.transform(body ?? {}),
    };
  }

  const parsed = bodyPipe.transform(body);
  return {
    templateName: parsed.template_name,
    context: parsed.context,
  };
}

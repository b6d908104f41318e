/**
 * Template Renderer
 *
 * Renders templates with Handlebars. Interpolated values are HTML-escaped,
 * variables missing from the context render as empty strings, and block
 * helpers standing alone on a line take no whitespace with them.
 * Templates are compiled on every render; nothing is cached.
 */
import { Injectable, Inject } from '@nestjs/common';
import Handlebars from 'handlebars';
import { LoggerService } from '../logging/logger.service';
import { ok, internal, errorMessage, type OperationResult } from '../common/result';
import { TemplateStore } from './template-store.service';
import type { RenderContext, TemplateHandle } from './template.interface';

@Injectable()
export class TemplateRenderer {
  private readonly engine = Handlebars.create();
  private readonly logger: LoggerService;

  constructor(
    @Inject(TemplateStore) private readonly store: TemplateStore,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    this.logger = logger.child('TemplateRenderer');
  }

  render(handle: TemplateHandle, context: RenderContext): OperationResult<string> {
    try {
      const template = this.engine.compile(handle.source, {
        strict: false,
        noEscape: false,
      });

      return ok(template({ ...context }));
    } catch (error) {
      this.logger.error('Failed to render template', error, { name: handle.name });
      return internal(`Failed to render template '${handle.name}': ${errorMessage(error)}`);
    }
  }

  /**
   * Resolve a template by name and render it; store failures pass through unchanged
   */
  async renderByName(
    name: string,
    context: RenderContext,
  ): Promise<OperationResult<string>> {
    const resolved = await this.store.resolve(name);
    if (!resolved.ok) {
      return resolved;
    }

    return this.render(resolved.value, context);
  }
}

import {
  Controller,
  Get,
  Post,
  Body,
  Query,
  HttpCode,
  Inject,
  UploadedFile,
  UseInterceptors,
  BadRequestException,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiQuery, ApiTags } from '@nestjs/swagger';
import { unwrapResult } from '../common/result';
import { TemplateStore } from './template-store.service';
import { TemplateRenderer } from './template-renderer.service';
import {
  parseGenerateHtmlRequest,
  type GenerateHtmlResponse,
} from './dto/generate-html.dto';
import {
  UPLOAD_FIELD,
  decodeUploadFilename,
  type UploadTemplateResponse,
} from './dto/upload-template.dto';
import type { UploadedTemplateFile } from './template.interface';

@ApiTags('templates')
@Controller()
export class TemplatesController {
  constructor(
    @Inject(TemplateStore) private readonly store: TemplateStore,
    @Inject(TemplateRenderer) private readonly renderer: TemplateRenderer,
  ) {}

  @Get('templates')
  async listTemplates(): Promise<{ templates: string[] }> {
    return { templates: unwrapResult(await this.store.list()) };
  }

  /**
   * Render a template without sending it
   */
  @Post('generate-email-html')
  @HttpCode(200)
  @ApiQuery({ name: 'template_name', required: false })
  @ApiBody({
    description:
      'The context map when template_name is in the query, otherwise { template_name, context }',
    schema: { type: 'object' },
  })
  async generateEmailHtml(
    @Query() query: Record<string, unknown>,
    @Body() body: unknown,
  ): Promise<GenerateHtmlResponse> {
    const request = parseGenerateHtmlRequest(query, body);
    const html = await this.renderer.renderByName(request.templateName, request.context);

    return { html_content: unwrapResult(html) };
  }

  @Post('upload-template')
  @HttpCode(200)
  @UseInterceptors(FileInterceptor(UPLOAD_FIELD))
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      required: [UPLOAD_FIELD],
      properties: { [UPLOAD_FIELD]: { type: 'string', format: 'binary' } },
    },
  })
  async uploadTemplate(
    @UploadedFile() file: UploadedTemplateFile | undefined,
  ): Promise<UploadTemplateResponse> {
    if (!file) {
      throw new BadRequestException(`Missing multipart field '${UPLOAD_FIELD}'`);
    }

    const filename = unwrapResult(
      await this.store.store(decodeUploadFilename(file.originalname), file.buffer),
    );

    return {
      status: 'success',
      message: `Template '${filename}' uploaded successfully`,
    };
  }
}

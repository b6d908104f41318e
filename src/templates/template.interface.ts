/**
 * Render context: variable name to string value, supplied per request
 */
export type RenderContext = Record<string, string>;

/**
 * A resolved template, ready to render
 */
export interface TemplateHandle {
  /** File name, also the lookup key */
  name: string;
  /** Absolute path inside the template directory */
  path: string;
  /** Raw template source */
  source: string;
}

/**
 * The part of an uploaded multipart file the store needs.
 * Matches the shape multer's memory storage hands to @UploadedFile().
 */
export interface UploadedTemplateFile {
  originalname: string;
  buffer: Buffer;
  size: number;
}

export const UPLOAD_FIELD = 'file';

/**
 * multer reads multipart filenames as latin1; browsers and curl send UTF-8
 */
export function decodeUploadFilename(originalname: string): string {
  return Buffer.from(originalname, 'latin1').toString('utf8');
}

export interface UploadTemplateResponse {
  status: 'success';
  message: string;
}

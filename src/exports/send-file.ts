import type { Response } from 'express';
import { ExportFile } from './exports.types';

export type FileResponse = Pick<Response, 'setHeader' | 'send'>;

export function sendFile(res: FileResponse, file: ExportFile): void {
  res.setHeader('Content-Type', file.contentType);
  res.setHeader('Content-Disposition', `attachment; filename=${file.filename}`);
  res.send(file.buffer);
}

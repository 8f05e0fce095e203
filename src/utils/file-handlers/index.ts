import path from 'path';
import { DocxHandler } from './docx.handler';
import { TextHandler } from './text.handler';
import type { FileHandler } from './types';

const handlers: FileHandler[] = [new DocxHandler(), new TextHandler()];

export const resolveHandler = (filename: string, mimetype?: string) => {
  const extension = path.extname(filename).toLowerCase();
  return handlers.find((handler) => handler.supports(mimetype, extension));
};

export { DocxHandler, TextHandler };
export type { FileHandler };

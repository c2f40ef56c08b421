import multer from 'multer';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import fs from 'fs/promises';
import type { Request } from 'express';
import { MAX_FILE_SIZE, UPLOAD_DIR } from '../config';
import { FormatError } from '../errors';

const ALLOWED_TYPES: Record<string, string[]> = {
  document: ['.docx'],
  workbook: ['.xlsx']
};

const storage = multer.diskStorage({
  destination: (_req, _file, cb) => {
    fs.mkdir(UPLOAD_DIR, { recursive: true })
      .then(() => cb(null, UPLOAD_DIR))
      .catch((error: Error) => cb(error, UPLOAD_DIR));
  },
  filename: (_req, file, cb) => {
    const uniqueId = uuidv4();
    const ext = path.extname(file.originalname).toLowerCase();
    cb(null, `${uniqueId}${ext}`);
  }
});

const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const allowedTypes = ALLOWED_TYPES[file.fieldname] ?? [];
  const ext = path.extname(file.originalname).toLowerCase();

  if (allowedTypes.includes(ext)) {
    cb(null, true);
  } else {
    cb(new FormatError(`File type ${ext || '(none)'} not supported for ${file.fieldname}. Allowed types: ${allowedTypes.join(', ') || 'none'}`));
  }
};

export const upload = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: MAX_FILE_SIZE
  }
});

export async function removeUploads(files: Array<Express.Multer.File | undefined>): Promise<void> {
  await Promise.all(
    files.flatMap(file => file ? [fs.unlink(file.path).catch(console.error)] : [])
  );
}

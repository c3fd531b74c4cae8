import multer from 'multer';
import type { Request, Response, NextFunction } from 'express';
import * as path from 'path';
import * as fs from 'fs';
import { badRequest } from '../errors';

export const UPLOAD_PREFIX = 'staging-upload-';

const ALLOWED_EXTENSIONS = ['.tsv', '.tab', '.txt', '.csv'];

const ALLOWED_MIME_TYPES = [
  'text/tab-separated-values',
  'text/plain',
  'text/csv',
  'application/octet-stream', // curl without an explicit type
];

/**
 * File filter to accept delimited text files
 */
function fileFilter(_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback): void {
  const ext = path.extname(file.originalname).toLowerCase();

  if (ALLOWED_EXTENSIONS.includes(ext) || ALLOWED_MIME_TYPES.includes(file.mimetype)) {
    cb(null, true);
  } else {
    cb(badRequest(`Only ${ALLOWED_EXTENSIONS.join(', ')} files are allowed`));
  }
}

/**
 * Express middleware storing the `datafile` field under `storageDir`.
 * Responds 400 when no file was sent.
 */
export function createUploadMiddleware(storageDir: string) {
  if (!fs.existsSync(storageDir)) {
    fs.mkdirSync(storageDir, { recursive: true });
  }

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, storageDir);
    },
    filename: (_req, file, cb) => {
      const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1e9);
      const ext = path.extname(file.originalname).toLowerCase() || '.tsv';
      cb(null, UPLOAD_PREFIX + uniqueSuffix + ext);
    },
  });

  const upload = multer({
    storage,
    fileFilter,
    limits: {
      fileSize: 1024 * 1024 * 1024, // 1GB limit
    },
  }).single('datafile');

  return (req: Request, res: Response, next: NextFunction): void => {
    upload(req, res, (err: unknown) => {
      if (err) {
        return next(err);
      }
      if (!req.file) {
        return next(badRequest('No file uploaded'));
      }
      next();
    });
  };
}

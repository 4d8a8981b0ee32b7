import { Router, Request, Response } from 'express';
import multer from 'multer';
import path from 'node:path';
import fs from 'node:fs';
import crypto from 'node:crypto';
import { getConfig } from '../config.js';

const router = Router();

const ACCEPTED_EXTENSIONS = ['.json', '.zip'];
// Upload IDs are crypto.randomUUID() values
const RE_UPLOAD_ID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function getUpload() {
  const config = getConfig();
  fs.mkdirSync(config.uploadDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: config.uploadDir,
    filename: (_req, file, cb) => {
      const id = crypto.randomUUID();
      cb(null, `${id}${path.extname(file.originalname).toLowerCase()}`);
    },
  });

  return multer({
    storage,
    limits: { fileSize: config.maxFileSize },
    fileFilter: (_req, file, cb) => {
      if (ACCEPTED_EXTENSIONS.includes(path.extname(file.originalname).toLowerCase())) {
        cb(null, true);
      } else {
        cb(new Error('Only .json and .zip telemetry exports are accepted'));
      }
    },
  });
}

/**
 * Find a stored upload by ID, whichever extension it was saved with.
 */
export function findUpload(id: string): string | undefined {
  if (!RE_UPLOAD_ID.test(id)) return undefined;

  const { uploadDir } = getConfig();
  return ACCEPTED_EXTENSIONS
    .map((ext) => path.join(uploadDir, `${id}${ext}`))
    .find((candidate) => fs.existsSync(candidate));
}

/**
 * POST /api/upload
 * Upload a telemetry export (.json events file or .zip of them).
 * Returns { id, filename, size }.
 */
router.post('/', (req: Request, res: Response) => {
  const upload = getUpload();
  upload.single('file')(req, res, (err: unknown) => {
    if (err) {
      const message = err instanceof Error ? err.message : String(err);
      return res.status(400).json({ error: message });
    }

    if (!req.file) {
      return res.status(400).json({ error: 'No file uploaded' });
    }

    const id = path.basename(req.file.filename, path.extname(req.file.filename));
    console.log(`[upload] Stored ${req.file.originalname} as ${id} (${req.file.size} bytes)`);

    res.json({
      id,
      filename: req.file.originalname,
      size: req.file.size,
    });
  });
});

export default router;

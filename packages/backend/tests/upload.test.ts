import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const UPLOAD_ID = '3f2b8c1e-9a4d-4e6f-8b7a-1c2d3e4f5a6b';

describe('findUpload', () => {
  const originalEnv = { ...process.env };
  let root: string;
  let uploadDir: string;

  beforeEach(() => {
    vi.resetModules();
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'uploads-'));
    uploadDir = path.join(root, 'uploads');
    fs.mkdirSync(uploadDir);
    process.env.UPLOAD_DIR = uploadDir;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should find an upload by id whatever its extension', async () => {
    fs.writeFileSync(path.join(uploadDir, `${UPLOAD_ID}.zip`), '');

    const { findUpload } = await import('../src/routes/upload.js');

    expect(findUpload(UPLOAD_ID)).toBe(path.join(uploadDir, `${UPLOAD_ID}.zip`));
  });

  it('should return undefined for an unknown id', async () => {
    const { findUpload } = await import('../src/routes/upload.js');

    expect(findUpload(UPLOAD_ID)).toBeUndefined();
  });

  it('should ignore ids that would leave the upload directory', async () => {
    fs.writeFileSync(path.join(root, 'outside.json'), '[]');

    const { findUpload } = await import('../src/routes/upload.js');

    expect(findUpload('../outside')).toBeUndefined();
    expect(findUpload(`${UPLOAD_ID}/../../outside`)).toBeUndefined();
  });
});

import { open, Entry } from 'yauzl-promise';

/**
 * Read every `.json` entry of a telemetry export archive.
 * Returns file name → UTF-8 content, in archive order.
 */
export async function unpackEventArchive(zipPath: string): Promise<Map<string, string>> {
  const zipFile = await open(zipPath);
  const contents = new Map<string, string>();

  try {
    for await (const entry of zipFile) {
      const fileName = entry.filename;

      // Skip directories
      if (fileName.endsWith('/')) continue;
      if (!isEventFile(fileName)) continue;

      const buffer = await readEntry(entry);
      contents.set(fileName, buffer.toString('utf-8'));
    }
  } finally {
    await zipFile.close();
  }

  return contents;
}

async function readEntry(entry: Entry): Promise<Buffer> {
  const stream = await entry.openReadStream();
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export function isEventFile(fileName: string): boolean {
  const base = fileName.split('/').pop() ?? '';
  // macOS archives carry "._name.json" resource forks
  return base.endsWith('.json') && !base.startsWith('._');
}

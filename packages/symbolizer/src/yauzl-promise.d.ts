// yauzl-promise publishes no type declarations; only the surface used here.
declare module 'yauzl-promise' {
  import { Readable } from 'node:stream';

  export interface Entry {
    filename: string;
    openReadStream(): Promise<Readable>;
  }

  export interface ZipFile {
    close(): Promise<void>;
    [Symbol.asyncIterator](): AsyncIterableIterator<Entry>;
  }

  export function open(path: string): Promise<ZipFile>;
}

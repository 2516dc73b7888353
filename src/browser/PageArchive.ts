import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/** Strips characters that are not allowed in file names and caps the length. */
export function safeFileName(name: string): string {
  return name.replace(/[<>:"/\\|?*]/g, '_').slice(0, 50);
}

/**
 * Keeps HTML snapshots of visited pages under `<root>/<run timestamp>/` for
 * debugging selectors after a run.
 */
export class PageArchive {
  readonly dir: string;

  constructor(root = 'saved_pages', now: Date = new Date()) {
    this.dir = path.join(root, timestamp(now));
  }

  async save(name: string, html: string): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const file = path.join(this.dir, `${safeFileName(name)}.html`);
    await writeFile(file, html, 'utf-8');
    return file;
  }
}

// engine/utils/atomic-write.ts — Write-then-rename so readers never see a partial file

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Write `content` to a temp file beside `filePath`, flush it, then rename it
 * over the target. The temp file is removed if any step fails.
 */
export function atomicWriteFileSync(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  const tmp = path.join(dir, `.${path.basename(filePath)}.tmp.${crypto.randomBytes(4).toString('hex')}`);

  fs.mkdirSync(dir, { recursive: true });
  try {
    const fd = fs.openSync(tmp, 'w', 0o644);
    try {
      fs.writeFileSync(fd, content, 'utf-8');
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tmp, filePath);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}

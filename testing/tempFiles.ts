import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export interface TempDir {
  dir: string;
  file(name: string): string;
  cleanup(): void;
}

export function makeTempDir(prefix: string): TempDir {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
  return {
    dir,
    file: (name) => path.join(dir, name),
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}

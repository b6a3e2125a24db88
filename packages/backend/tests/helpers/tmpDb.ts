import { randomUUID } from "node:crypto";
import { rmSync } from "node:fs";
import { resolve } from "node:path";

const createdDbFiles: string[] = [];

export function tmpDbPath(prefix: string): string {
  const path = resolve("tmp", `${prefix}-${randomUUID()}.db`);
  createdDbFiles.push(path);
  return path;
}

export function removeTmpDbs(): void {
  for (const path of createdDbFiles.splice(0)) {
    rmSync(path, { force: true });
    rmSync(`${path}-shm`, { force: true });
    rmSync(`${path}-wal`, { force: true });
  }
}

import * as fs from "fs";
import * as path from "path";
import type { SnapshotName } from "../tasks/ecosystem/data-config";

export interface SnapshotStore {
  /** Replaces the named snapshot with `data`. */
  write(name: SnapshotName, data: unknown): void;
  /** Parsed document, or `null` when the snapshot does not exist. */
  read(name: SnapshotName): unknown;
}

export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly dataDir: string) {}

  path(name: SnapshotName): string {
    return path.join(this.dataDir, `${name}.json`);
  }

  write(name: SnapshotName, data: unknown): void {
    if (!fs.existsSync(this.dataDir)) {
      fs.mkdirSync(this.dataDir, { recursive: true });
    }

    const filePath = this.path(name);
    fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
    console.log(`💾 Saved ${filePath}`);
  }

  read(name: SnapshotName): unknown {
    const filePath = this.path(name);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  }
}

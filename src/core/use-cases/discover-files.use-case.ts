import { join } from "node:path";
import { readdirSync, statSync } from "node:fs";
import type { DiscoveredFile } from "../domain/entities/shipment.entity.js";

export interface DiscoverFilesRequest {
  inputDir: string;
  extension: string;
  tempFilePrefix: string;
}

export class DiscoverFilesUseCase {
  /**
   * Lists the input workbooks directly inside `inputDir`, sorted by name so
   * that output rows come out in a stable order. Subdirectories are not
   * walked.
   */
  execute(request: DiscoverFilesRequest): DiscoveredFile[] {
    const files: DiscoveredFile[] = [];

    for (const fileName of readdirSync(request.inputDir)) {
      if (!fileName.endsWith(request.extension)) continue;
      if (request.tempFilePrefix && fileName.startsWith(request.tempFilePrefix)) {
        continue;
      }
      const filePath = join(request.inputDir, fileName);
      if (!this.isRegularFile(filePath)) continue;
      files.push({ fileName, filePath });
    }

    return files.sort((a, b) => compareCodePoints(a.fileName, b.fileName));
  }

  // statSync follows symlinks; a dangling link is not a file.
  private isRegularFile(filePath: string): boolean {
    try {
      return statSync(filePath).isFile();
    } catch {
      return false;
    }
  }
}

/** Orders by Unicode code point, so astral characters sort after U+FFFF. */
export function compareCodePoints(a: string, b: string): number {
  const left = a[Symbol.iterator]();
  const right = b[Symbol.iterator]();
  for (;;) {
    const l = left.next();
    const r = right.next();
    if (l.done || r.done) return l.done === r.done ? 0 : l.done ? -1 : 1;
    const diff = (l.value.codePointAt(0) ?? 0) - (r.value.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
}

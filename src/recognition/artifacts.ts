import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";

/**
 * Per-request scope for temporary files. Everything written through it is
 * removed by `release()`, which the pipeline calls from a `finally` block.
 */
export class TempArtifacts {
  private readonly files = new Set<string>();
  private released = false;

  constructor(private readonly dir: string) {}

  async write(baseName: string, data: Uint8Array): Promise<string> {
    if (this.released) {
      throw new Error("Cannot write to a released artifact scope");
    }
    await mkdir(this.dir, { recursive: true });
    const filePath = path.join(this.dir, `${randomUUID()}_${baseName}`);
    this.files.add(filePath);
    await writeFile(filePath, data);
    return filePath;
  }

  get paths(): string[] {
    return [...this.files];
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    const results = await Promise.allSettled(
      [...this.files].map((filePath) => rm(filePath, { force: true }))
    );
    this.files.clear();
    for (const result of results) {
      if (result.status === "rejected") {
        console.error("Failed to remove temporary file:", result.reason);
      }
    }
  }
}

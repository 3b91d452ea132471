import fs from "node:fs";
import path from "node:path";

export interface StagedUpload {
  readonly path: string;
  read(): Promise<Buffer>;
  release(): Promise<void>;
}

/**
 * Writes upload bytes into a private temp directory. The caller owns the
 * returned handle and must release it.
 */
export class TempIntake {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  async stage(documentId: string, content: Uint8Array): Promise<StagedUpload> {
    await fs.promises.mkdir(this.baseDir, { recursive: true });
    const dir = await fs.promises.mkdtemp(path.join(this.baseDir, `doc-scan-${documentId}-`));
    const filePath = path.join(dir, "upload.pdf");

    try {
      await fs.promises.writeFile(filePath, content);
    } catch (error) {
      await fs.promises.rm(dir, { recursive: true, force: true });
      throw error;
    }

    let released = false;
    return {
      path: filePath,
      read: () => fs.promises.readFile(filePath),
      release: async () => {
        if (released) {
          return;
        }
        released = true;
        await fs.promises.rm(dir, { recursive: true, force: true });
      },
    };
  }
}

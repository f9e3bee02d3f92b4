import { randomBytes } from "crypto";
import { promises as fs } from "fs";
import path from "path";

/**
 * Writes through a sibling temp file and renames it over the target, so a concurrent
 * reader sees either the previous content or the complete new content.
 */
export async function atomicWriteFile(filePath: string, content: string | Buffer, mode = 0o644): Promise<void> {
  const dir = path.dirname(filePath);
  const tmp = path.join(dir, `.${path.basename(filePath)}.tmp.${randomBytes(4).toString("hex")}`);

  await fs.mkdir(dir, { recursive: true });
  try {
    const fd = await fs.open(tmp, "w", 0o600);
    try {
      await fd.writeFile(content);
      await fd.datasync();
    } finally {
      await fd.close();
    }
    await fs.chmod(tmp, mode);
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

export async function atomicWriteJson(filePath: string, data: unknown, mode = 0o644): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, 2) + "\n", mode);
}

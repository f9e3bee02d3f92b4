import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { JsonObject } from "../core/json.js";

export const REGISTRY_AUTH_PREFIX = "engine_runner_registry_";

export interface AuthFile {
  /** Private directory holding the file (mode 0700). */
  dir: string;
  file: string;
}

function usesDockerConfigDir(runtime: string): boolean {
  return path.basename(runtime).startsWith("docker");
}

/**
 * Docker reads credentials from `<dir>/config.json` given as `--config <dir>`; podman and
 * the local variants take the file itself (`--authfile`, `REGISTRY_AUTH_FILE`).
 */
export async function writeAuthFile(payload: JsonObject, runtime: string): Promise<AuthFile> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), REGISTRY_AUTH_PREFIX));
  await fs.chmod(dir, 0o700);
  const file = path.join(dir, usesDockerConfigDir(runtime) ? "config.json" : "auth.json");
  try {
    await fs.writeFile(file, JSON.stringify(payload), { mode: 0o600, flag: "wx" });
  } catch (err) {
    await fs.rm(dir, { recursive: true, force: true });
    throw err;
  }
  return { dir, file };
}

export async function removeAuthFile(auth: AuthFile | null): Promise<void> {
  if (!auth) return;
  await fs.rm(auth.dir, { recursive: true, force: true });
}

export function authArgsFor(runtime: string, auth: AuthFile | null): { global: string[]; run: string[] } {
  if (!auth) return { global: [], run: [] };
  if (usesDockerConfigDir(runtime)) return { global: ["--config", auth.dir], run: [] };
  return { global: [], run: ["--authfile", auth.file] };
}

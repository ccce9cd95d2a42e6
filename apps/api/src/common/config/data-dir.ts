import { isAbsolute, resolve } from "path";

export function resolveDataDir(): string {
  const configured = process.env.DATA_DIR?.trim();
  return configured ? resolve(configured) : process.cwd();
}

export function resolveDataPath(filePath: string): string {
  const trimmed = filePath.trim();
  if (!trimmed) {
    throw new Error("File path must not be blank");
  }
  return isAbsolute(trimmed) ? trimmed : resolve(resolveDataDir(), trimmed);
}

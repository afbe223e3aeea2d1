import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { CONFIG_KEYS } from "./defaults";
import type { ConfigData } from "./defaults";

const CONFIG_DIR = join(homedir(), ".enclosure");
const CONFIG_PATH = join(CONFIG_DIR, "config.json");

export function getConfigPath(): string {
  return CONFIG_PATH;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export async function readConfigFile(
  path: string = CONFIG_PATH,
): Promise<Partial<ConfigData>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${path} is malformed and was ignored. ` +
          `Run "enclosure config set" to recreate it.`,
      );
      return {};
    }
    throw err;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  const data: Partial<ConfigData> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isConfigKey(key) && typeof value === "string") {
      data[key] = value;
    }
  }
  return data;
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
  path: string = CONFIG_PATH,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
  path: string = CONFIG_PATH,
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile(path);
  existing[key] = value;
  await writeConfigFile(existing, path);
  return existing;
}

const KEYS: ReadonlySet<string> = new Set<string>(CONFIG_KEYS);

export function isConfigKey(key: string): key is keyof ConfigData {
  return KEYS.has(key);
}

import fs from "node:fs";
import path from "node:path";
import { createInterface } from "node:readline/promises";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./errors.js";
import { isRecord } from "./json.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const PROJECT_ROOT = path.resolve(__dirname, "..");

export const DEFAULT_CONFIG_PATH = process.env.CONFIG_PATH ?? path.join(PROJECT_ROOT, "config.json");
export const DEFAULT_DATA_DIR = process.env.DATA_DIR ?? path.join(process.cwd(), "data");
export const DEFAULT_TIME_ZONE = "America/Los_Angeles";

export interface AppConfig {
  vault: string;
  item: string;
  timeZone: string;
}

export type Prompt = (question: string) => Promise<string>;

async function terminalPrompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

function pickString(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return undefined;
}

export function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Resolves vault and item from the environment or config.json, asking on the
 * terminal the first time and saving the answers. Persisted values are never
 * rewritten afterwards.
 */
export async function loadConfig({
  configPath = DEFAULT_CONFIG_PATH,
  env = process.env,
  prompt,
  interactive = Boolean(process.stdin.isTTY)
}: {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  prompt?: Prompt;
  interactive?: boolean;
} = {}): Promise<AppConfig> {
  const stored = readConfigFile(configPath);
  const ask = prompt ?? (interactive ? terminalPrompt : undefined);

  let vault = pickString(env.OP_VAULT, stored.vault, stored.op_vault);
  let item = pickString(env.OP_ITEM, stored.item, stored.op_item);
  const timeZone = pickString(env.READING_TZ, stored.timeZone) ?? DEFAULT_TIME_ZONE;

  const missing = !vault || !item;
  if (missing && !ask) {
    throw new ConfigError(
      `No 1Password vault/item configured. Run once in a terminal, set OP_VAULT and OP_ITEM, or edit ${configPath}.`
    );
  }

  if (!vault && ask) {
    vault = pickString(await ask("1Password vault name: "));
  }
  if (!item && ask) {
    item = pickString(await ask("1Password item name for the dashboard login: "));
  }
  if (!vault || !item) {
    throw new ConfigError("Both a 1Password vault and item name are required.");
  }

  if (missing) {
    const next = { ...stored, vault, item };
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, `${JSON.stringify(next, null, 2)}\n`, "utf8");
    console.log(`💾 Config saved to ${configPath}`);
  }

  return { vault, item, timeZone };
}

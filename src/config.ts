import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import { z } from "zod";

export const LOG_LEVELS = [
  "error",
  "warn",
  "info",
  "verbose",
  "debug",
  "silly",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface KeystorePackConfig {
  logLevel: LogLevel;
  /** Suppress all log output */
  silent: boolean;
}

const ConfigSchema = z
  .object({
    logLevel: z.enum(LOG_LEVELS),
    silent: z.boolean(),
  })
  .partial();

const defaults: KeystorePackConfig = {
  logLevel: "info",
  silent: false,
};

/* Bad rc files and env values are skipped with a warning; loading never throws. */
function readYaml(filePath: string): Partial<KeystorePackConfig> {
  const abs = path.resolve(process.cwd(), filePath);
  try {
    if (!fs.existsSync(abs)) return {};

    const raw = fs.readFileSync(abs, "utf8");
    const parsed = ConfigSchema.safeParse(yaml.parse(raw) ?? {});
    if (!parsed.success) {
      console.warn(
        `[keystore-pack] ignoring invalid config file ${abs}: ${parsed.error.message}`
      );
      return {};
    }
    return parsed.data;
  } catch (err) {
    console.warn(
      `[keystore-pack] ignoring unreadable config file ${abs}: ${
        err instanceof Error ? err.message : String(err)
      }`
    );
    return {};
  }
}

function readEnv(): Partial<KeystorePackConfig> {
  const level = process.env["KEYSTORE_PACK_LOG_LEVEL"];
  const silent = process.env["KEYSTORE_PACK_LOG_SILENT"];

  const envCfg: Partial<KeystorePackConfig> = {};
  if (level) {
    const parsed = z.enum(LOG_LEVELS).safeParse(level);
    if (parsed.success) {
      envCfg.logLevel = parsed.data;
    } else {
      console.warn(
        `[keystore-pack] ignoring KEYSTORE_PACK_LOG_LEVEL=${JSON.stringify(level)}; expected one of ${LOG_LEVELS.join(", ")}`
      );
    }
  }
  if (silent) envCfg.silent = silent === "true" || silent === "1";
  return envCfg;
}

class ConfigManagerClass {
  private _cfg?: Readonly<KeystorePackConfig>;

  load(userCfg: Partial<KeystorePackConfig> = {}): void {
    const rc = process.env["KEYSTORE_PACK_RC"];
    const fileCfg = rc ? readYaml(rc) : {};

    this._cfg = Object.freeze({
      ...defaults,
      ...fileCfg,
      ...readEnv(),
      ...userCfg,
    });
  }

  /** Loaded lazily from defaults, rc file and environment on first access. */
  get cfg(): Readonly<KeystorePackConfig> {
    if (!this._cfg) this.load();
    if (!this._cfg) throw new Error("keystore-pack: configuration not loaded");
    return this._cfg;
  }

  reset(): void {
    this._cfg = undefined;
  }
}

export const ConfigManager = new ConfigManagerClass();

/**
 * Override configuration for the current process. Values given here win over
 * the rc file and environment variables. The logger picks the new settings up
 * on its next call.
 */
export function configure(cfg: Partial<KeystorePackConfig> = {}): void {
  ConfigManager.load(cfg);
}

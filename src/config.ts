import { promises as fs } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { z } from "zod";
import { ConfigError, describeError } from "./errors.js";
import { DEFAULT_MODELS } from "./providers/index.js";
import { isProviderId, type ProviderConfig, type ProviderId } from "./providers/types.js";

export const CONFIG_PATH = join(homedir(), ".sayso", "config.json");

export const DEFAULT_PROVIDER: ProviderId = "digitalocean_gradient";

// each provider's own key variable, used when nothing else names a key
export const PROVIDER_KEY_ENV: Record<ProviderId, string> = {
  groq: "GROQ_API_KEY",
  digitalocean_gradient: "GRADIENT_API_KEY",
  gemini: "GEMINI_API_KEY",
};

const StoredConfigSchema = z.object({
  provider: z.string().optional(),
  api_key: z.string().optional(),
  model: z.string().optional(),
});

export type StoredConfig = z.infer<typeof StoredConfigSchema>;

export interface ConfigOverrides {
  provider?: string;
  model?: string;
}

export interface ResolvedConfig {
  provider: ProviderId;
  model: string;
  apiKey?: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function loadConfig(path: string = CONFIG_PATH): Promise<StoredConfig | null> {
  let data: string;
  try {
    data = await fs.readFile(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw new ConfigError(`Cannot read config at ${path}: ${describeError(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (error) {
    throw new ConfigError(`Config at ${path} is not valid JSON. Run \`sayso --setup\` or \`sayso --reset\`.`, describeError(error));
  }

  const parsed = StoredConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Config at ${path} has an unexpected shape.`, parsed.error.issues);
  }
  return parsed.data;
}

/** Writes the config readable by the owner only. */
export async function saveConfig(config: StoredConfig, path: string = CONFIG_PATH): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true, mode: 0o700 });
  await fs.writeFile(path, JSON.stringify(config, null, 2) + "\n", { mode: 0o600 });
  // writeFile only applies mode when it creates the file
  await fs.chmod(path, 0o600);
}

export async function resetConfig(path: string = CONFIG_PATH): Promise<boolean> {
  try {
    await fs.unlink(path);
    return true;
  } catch (error) {
    if (isMissingFile(error)) return false;
    throw new ConfigError(`Cannot remove config at ${path}: ${describeError(error)}`);
  }
}

/**
 * Precedence, highest first: flags, SAYSO_* variables, the config file,
 * the provider's own key variable, built-in defaults. Stored key and model
 * only apply while the stored provider is the one in use.
 */
export function resolveConfig(
  stored: StoredConfig | null,
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): ResolvedConfig {
  const storedProvider = stored?.provider || DEFAULT_PROVIDER;
  const provider = overrides.provider || env.SAYSO_PROVIDER || storedProvider;
  if (!isProviderId(provider)) {
    throw new ConfigError(
      `Unknown provider '${provider}'. Expected one of: ${Object.keys(DEFAULT_MODELS).join(", ")}.`
    );
  }

  const fromStore = provider === storedProvider ? stored : null;
  const model =
    overrides.model || env.SAYSO_MODEL || fromStore?.model || DEFAULT_MODELS[provider];
  const apiKey = env.SAYSO_API_KEY || fromStore?.api_key || env[PROVIDER_KEY_ENV[provider]];

  return { provider, model, apiKey: apiKey || undefined };
}

export function requireApiKey(resolved: ResolvedConfig): ProviderConfig {
  if (!resolved.apiKey) {
    throw new ConfigError(
      `No API key configured for ${resolved.provider}. Run \`sayso --setup\` or set ${PROVIDER_KEY_ENV[resolved.provider]}.`
    );
  }
  return { provider: resolved.provider, model: resolved.model, apiKey: resolved.apiKey };
}

export function maskKey(key: string): string {
  if (key.length <= 12) return "*".repeat(key.length);
  return `${key.slice(0, 8)}...${key.slice(-4)}`;
}

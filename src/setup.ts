import chalk from "chalk";
import {
  CONFIG_PATH,
  DEFAULT_PROVIDER,
  loadConfig,
  maskKey,
  saveConfig,
  type StoredConfig,
} from "./config.js";
import { MODEL_CATALOG, type ModelEntry } from "./models.js";
import type { Prompter } from "./prompter.js";
import { DEFAULT_MODELS, PROVIDER_LABELS } from "./providers/index.js";
import { PROVIDER_IDS, isProviderId, type ProviderId } from "./providers/types.js";

export interface SetupOptions {
  path?: string;
  print?: (text: string) => void;
}

function pickIndex(answer: string, count: number): number | undefined {
  if (!/^\d+$/.test(answer)) return undefined;
  const index = Number(answer) - 1;
  return index >= 0 && index < count ? index : undefined;
}

async function pickProvider(
  prompter: Prompter,
  current: ProviderId,
  print: (text: string) => void
): Promise<ProviderId | null> {
  print(`\n  ${chalk.bold("Select a provider")}\n`);
  PROVIDER_IDS.forEach((id, i) => {
    const marker = id === current ? chalk.green(" ← current") : "";
    print(`  ${chalk.cyan(String(i + 1).padStart(2))}  ${PROVIDER_LABELS[id]}${marker}`);
  });
  print("");

  for (;;) {
    const answer = await prompter.ask(`  Choice [1-${PROVIDER_IDS.length}]: `);
    if (answer === null) return null;
    if (!answer.trim()) return current;

    const index = pickIndex(answer.trim(), PROVIDER_IDS.length);
    if (index !== undefined) return PROVIDER_IDS[index];
    print(chalk.red(`  Enter a number between 1 and ${PROVIDER_IDS.length}`));
  }
}

async function pickModel(
  prompter: Prompter,
  provider: ProviderId,
  print: (text: string) => void
): Promise<string | null> {
  const models: ModelEntry[] = MODEL_CATALOG[provider];
  const fallback = DEFAULT_MODELS[provider];

  print(`\n  ${chalk.bold("Select a model")} ${chalk.dim("(lightest → heaviest):")}\n`);
  models.forEach((model, i) => {
    const marker = model.id === fallback ? chalk.green(" ← default") : "";
    print(
      `  ${chalk.cyan(String(i + 1).padStart(2))}  ${model.name.padEnd(24)} ${chalk.dim(model.description)}${marker}`
    );
  });
  print("");

  for (;;) {
    const answer = await prompter.ask(`  Choice [1-${models.length}]: `);
    if (answer === null) return null;
    if (!answer.trim()) return fallback;

    const index = pickIndex(answer.trim(), models.length);
    if (index !== undefined) {
      const selected = models[index];
      print(`  ${chalk.green("✓")} ${selected.name} (${selected.id})`);
      return selected.id;
    }
    print(chalk.red(`  Enter a number between 1 and ${models.length}`));
  }
}

/**
 * Interactive first-run onboarding and reconfiguration. Returns the saved
 * config, or null when the user cancelled or gave no key.
 */
export async function runSetup(
  prompter: Prompter,
  options: SetupOptions = {}
): Promise<StoredConfig | null> {
  const path = options.path ?? CONFIG_PATH;
  const print = options.print ?? ((text: string) => console.log(text));
  const cancelled = () => {
    print(chalk.dim("\nSetup cancelled."));
    return null;
  };

  print(`\n${chalk.yellow("sayso setup")}`);
  print(chalk.dim(`Config stored in ${path}`));

  const existing = (await loadConfig(path)) ?? {};
  const storedProvider =
    existing.provider && isProviderId(existing.provider) ? existing.provider : DEFAULT_PROVIDER;

  const provider = await pickProvider(prompter, storedProvider, print);
  if (provider === null) return cancelled();

  // a key saved for another provider is useless here
  const currentKey = provider === storedProvider ? existing.api_key ?? "" : "";
  print("");
  if (currentKey) {
    print(chalk.dim(`  Current key: ${maskKey(currentKey)}`));
  }
  const entered = await prompter.ask("  Enter API key (or press Enter to keep current): ");
  if (entered === null) return cancelled();

  const apiKey = entered.trim() || currentKey;
  if (!apiKey) {
    print(chalk.red("  Key cannot be empty."));
    return null;
  }

  const model = await pickModel(prompter, provider, print);
  if (model === null) return cancelled();

  const config: StoredConfig = { provider, api_key: apiKey, model };
  await saveConfig(config, path);
  print(`\n  ${chalk.green("✓ Saved.")} Run \`sayso <request>\` to get started.\n`);
  return config;
}

import { Command } from "commander";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  writeConfigFile,
  getConfigPath,
  isConfigKey,
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  SECRET_KEYS,
  ConfigData,
} from "../config";
import { createPrompter } from "./prompter";

/** Keys the wizard asks for, in order */
const WIZARD_KEYS: (keyof ConfigData)[] = [
  "baseUrl",
  "apiKey",
  "apiMode",
  "firstAgentName",
  "firstAgentModel",
  "secondAgentName",
  "secondAgentModel",
];

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.llmduel/config.json)");

  configCmd.action(async () => {
    await runWizard();
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isConfigKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
        process.exit(1);
      }
      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${display(key, value)}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isConfigKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
        process.exit(1);
      }
      const resolved = await resolveConfig();
      console.log(resolved[key]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      await printConfigList();
    });
}

export async function runWizard(): Promise<void> {
  const existing = await readConfigFile();
  const prompter = createPrompter();

  console.log("\nllmduel configuration");
  console.log("─────────────────────\n");

  try {
    const data: Partial<ConfigData> = { ...existing };
    for (const key of WIZARD_KEYS) {
      const current = existing[key] || DEFAULTS[key];
      const answer = await prompter.ask(`${key} [${display(key, current)}]: `);
      data[key] = answer.trim() || current;
    }

    await writeConfigFile(data);
    console.log(`\nConfig saved to ${getConfigPath()}\n`);

    const resolved = await resolveConfig();
    for (const key of CONFIG_KEYS) {
      console.log(`  ${key}: ${display(key, resolved[key])}`);
    }
    console.log("");
  } finally {
    prompter.close();
  }
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    const source = configSource(key, fileData);
    console.log(`  ${key}: ${display(key, resolved[key])}  (${source})`);
  }
  console.log("");
}

export function maskSecret(value: string): string {
  if (!value || value.length < 10) return value ? "****" : "(not set)";
  return value.slice(0, 3) + "..." + value.slice(-4);
}

function display(key: keyof ConfigData, value: string): string {
  if (SECRET_KEYS.includes(key)) return maskSecret(value);
  return value === "" ? "(not set)" : value;
}

export function configSource(
  key: keyof ConfigData,
  fileData: Partial<ConfigData>,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const envVal = env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  const fileVal = fileData[key];
  if (fileVal !== undefined && fileVal !== "") return "config file";
  return "default";
}

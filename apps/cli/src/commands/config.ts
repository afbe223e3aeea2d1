import { Command } from "commander";
import { createConsolePrompter } from "@enclosure/agents";
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
} from "../config/index";
import type { ConfigData } from "../config/index";

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.enclosure/config.json)");

  configCmd.action(async () => {
    await runWizard();
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isConfigKey(key)) {
        throw new Error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
      }
      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isConfigKey(key)) {
        throw new Error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
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
  const prompter = createConsolePrompter();

  console.log("\nEnclosure Configuration");
  console.log("───────────────────────\n");

  try {
    const player1 = await prompter.ask(
      `Player A agent [${existing.player1 || DEFAULTS.player1}]: `,
    );
    const player2 = await prompter.ask(
      `Player B agent [${existing.player2 || DEFAULTS.player2}]: `,
    );
    const boardSize = await prompter.ask(
      `Board size [${existing.boardSize || "random"}]: `,
    );

    const data: Partial<ConfigData> = {
      ...existing,
      player1: player1.trim() || existing.player1 || DEFAULTS.player1,
      player2: player2.trim() || existing.player2 || DEFAULTS.player2,
    };
    if (boardSize.trim()) {
      data.boardSize = boardSize.trim();
    }

    await writeConfigFile(data);
    console.log(`\nConfig saved to ${getConfigPath()}\n`);

    const resolved = await resolveConfig();
    for (const key of CONFIG_KEYS) {
      console.log(`  ${key}: ${display(resolved[key])}`);
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
    const source = getSource(key, fileData, process.env);
    console.log(`  ${key}: ${display(resolved[key])}  (${source})`);
  }
  console.log("");
}

function display(value: string): string {
  return value === "" ? "(not set)" : value;
}

export function getSource(
  key: keyof ConfigData,
  fileData: Partial<ConfigData>,
  env: NodeJS.ProcessEnv,
): string {
  const envVal = env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  if (fileData[key] !== undefined && fileData[key] !== "") return "config file";
  return "default";
}

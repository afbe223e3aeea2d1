import dotenv from "dotenv";
dotenv.config();

import { program } from "commander";
import { registerPlayCommand } from "./commands/play";
import { registerAutoplayCommand } from "./commands/autoplay";
import { registerAgentsCommand } from "./commands/agents";
import { registerConfigCommand } from "./commands/config";

program
  .name("enclosure")
  .description("Enclosure - two players wall off territory on a grid")
  .version("0.1.0", "-v, --version");

registerPlayCommand(program);
registerAutoplayCommand(program);
registerAgentsCommand(program);
registerConfigCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});

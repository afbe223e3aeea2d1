import { Command } from "commander";
import { createDefaultRegistry } from "@enclosure/agents";

export function registerAgentsCommand(program: Command): void {
  program
    .command("agents")
    .description("List available agents")
    .action(() => {
      const registry = createDefaultRegistry();
      console.log("\nAvailable Agents:");
      console.log("─────────────────");
      for (const name of registry.list()) {
        const agent = registry.create(name);
        console.log(`  ${name}${agent.autoplay ? "" : "  (interactive, no autoplay)"}`);
      }
      console.log("");
    });
}

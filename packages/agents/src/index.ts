import { MathRandom, RandomSource } from "@enclosure/core";
import { AgentRegistry } from "@enclosure/engine";
import { RandomAgent } from "./RandomAgent";
import { GreedyAgent } from "./GreedyAgent";
import { HumanAgent } from "./HumanAgent";

export { RandomAgent } from "./RandomAgent";
export { GreedyAgent, evaluate } from "./GreedyAgent";
export { HumanAgent, parsePosition, parseDirection } from "./HumanAgent";
export { createConsolePrompter } from "./prompt";
export type { Prompter } from "./prompt";

/**
 * Registry of the built-in agents. Agents that draw random numbers share `rng`.
 */
export function createDefaultRegistry(
  rng: RandomSource = new MathRandom()
): AgentRegistry {
  const registry = new AgentRegistry();
  registry.register("random_agent", () => new RandomAgent(rng));
  registry.register("greedy_agent", () => new GreedyAgent(rng));
  registry.register("human_agent", () => new HumanAgent());
  return registry;
}

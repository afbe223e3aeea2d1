export { Board, MIN_BOARD_SIZE, MAX_BOARD_SIZE, maxStepFor } from "./Board";
export { DisjointSet, checkEndgame, winnerOf } from "./connectivity";
export { checkValidStep, reachableCells } from "./reachability";
export { randomWalk } from "./randomWalk";
export {
  randomBoardSize,
  mirrorPosition,
  seedRandomWalls,
  rollStartPositions,
} from "./setup";
export { World } from "./World";
export type { WorldOptions } from "./World";
export { AgentRegistry } from "./AgentRegistry";
export type { IAgent, AgentFactory, ProposedMove } from "./interfaces/IAgent";
export { default as log, resolveLevel } from "./logger";

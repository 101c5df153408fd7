export { ScriptRunner, createRunner, buildScript } from "./runner.js";
export { spawnProcess } from "./process.js";
export { DEFAULT_RUNNER_CONFIG, PREAMBLE_STYLES } from "./types.js";
export type {
  PreambleStyle,
  RunnerConfig,
  ProcessOutput,
  ProcessExecutor,
} from "./types.js";

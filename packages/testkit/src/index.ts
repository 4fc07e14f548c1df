export { createTempDir, removeDir, withTempDir } from "./fs.js";
export { CLI_PATH, runCli, parseJsonOutput, type CliResult, type CliExecOptions } from "./cli.js";
export {
  personSchema,
  personType,
  petSchema,
  petType,
  people,
  pets,
  textType,
  type Person,
  type Pet,
} from "./fixtures.js";

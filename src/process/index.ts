export { launchProgram } from './launcher.js';
export type { LaunchOptions, ProgramLauncher } from './types.js';

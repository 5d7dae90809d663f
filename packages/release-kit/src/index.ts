export * from './types';
export * from './capabilities';
export * from './errors';
export * from './config';
export * from './logger';
export * from './naming';
export * from './version';
export * from './guard';
export * from './iconSet';
export * from './descriptor';
export * from './appBundle';
export * from './staging';
export * from './diskImage';
export * from './checksum';
export * from './verifier';
export * from './pipeline';
export * from './tools';
export {
  createCommandRunner,
  createPathToolLocator,
  runTool,
  splitCommandLine,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  type RunToolOptions,
  type ToolLocator
} from './lib/exec';

import type { CliOptions } from '../cli/args.js';
import type { ToolsConfig } from '../config.js';

export interface CommandContext {
  inputs: string[];
  options: CliOptions;
  config: ToolsConfig;
}

/**
 * Frame size from flags, falling back to the environment
 */
export function frameSize(ctx: CommandContext): { frameWidth: number; frameHeight: number } {
  return {
    frameWidth: ctx.options.width ?? ctx.config.frameWidth,
    frameHeight: ctx.options.height ?? ctx.config.frameHeight,
  };
}

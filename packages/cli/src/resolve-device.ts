import { isAbsolute, join } from 'node:path';
import { DebugModel } from '@steplink/core';
import type { ProjectConfig } from '@steplink/core';

export interface DeviceCommand {
  command: string;
  args: string[];
  cwd: string;
}

export function getProjectConfig(argv: Record<string, unknown>): ProjectConfig {
  return (argv['_config'] as ProjectConfig | undefined) ?? {};
}

function projectDir(argv: Record<string, unknown>): string {
  return (argv['project'] as string | undefined) ?? process.cwd();
}

/** Command line from positional args, falling back to `device` in the config. */
export function resolveDeviceCommand(
  argv: Record<string, unknown>,
  positional: string[],
): DeviceCommand {
  const config = getProjectConfig(argv);
  const dir = projectDir(argv);
  const cwd = config.device?.cwd ? resolvePath(dir, config.device.cwd) : dir;

  const [command, ...args] = positional;
  if (command) return { command, args, cwd };

  if (config.device?.command) {
    return { command: config.device.command, args: config.device.args ?? [], cwd };
  }
  throw new Error('No device command given. Pass one after "--" or set "device.command" in steplink.json.');
}

export function resolvePath(dir: string, path: string): string {
  return isAbsolute(path) ? path : join(dir, path);
}

export function loadDebugModel(argv: Record<string, unknown>): DebugModel | undefined {
  const explicit = argv['debugModel'] as string | undefined;
  const path = explicit ?? getProjectConfig(argv).debugModel;
  if (!path) return undefined;
  return DebugModel.load(resolvePath(projectDir(argv), path));
}

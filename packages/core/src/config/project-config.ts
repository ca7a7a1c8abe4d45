import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

export interface ProjectConfig {
  device?: { command?: string; args?: string[]; cwd?: string };
  debugModel?: string;
  client?: { timeout?: number };
}

export const CONFIG_FILENAME = 'steplink.json';

export function loadProjectConfig(projectDir: string): ProjectConfig {
  const filePath = join(projectDir, CONFIG_FILENAME);
  if (!existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new Error(`Failed to parse ${filePath}: ${err instanceof Error ? err.message : err}`);
  }

  return validateConfig(raw, filePath);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateConfig(raw: unknown, filePath: string): ProjectConfig {
  if (!isObject(raw)) {
    throw new Error(`${filePath}: config must be a JSON object`);
  }

  const obj = raw;
  const config: ProjectConfig = {};

  const knownKeys = new Set(['device', 'debugModel', 'client']);
  for (const key of Object.keys(obj)) {
    if (!knownKeys.has(key)) {
      console.warn(`Warning: unknown key "${key}" in ${filePath}`);
    }
  }

  // device
  const device = obj['device'];
  if (device !== undefined) {
    if (!isObject(device)) throw new Error(`${filePath}: "device" must be an object`);
    config.device = {};
    const command = device['command'];
    if (command !== undefined) {
      if (typeof command !== 'string' || command.trim().length === 0) throw new Error(`${filePath}: "device.command" must be a non-empty string`);
      config.device.command = command;
    }
    const args = device['args'];
    if (args !== undefined) {
      if (!Array.isArray(args) || !args.every((a): a is string => typeof a === 'string')) throw new Error(`${filePath}: "device.args" must be an array of strings`);
      config.device.args = args;
    }
    const cwd = device['cwd'];
    if (cwd !== undefined) {
      if (typeof cwd !== 'string') throw new Error(`${filePath}: "device.cwd" must be a string`);
      config.device.cwd = cwd;
    }
  }

  // debugModel
  const debugModel = obj['debugModel'];
  if (debugModel !== undefined) {
    if (typeof debugModel !== 'string') throw new Error(`${filePath}: "debugModel" must be a string`);
    config.debugModel = debugModel;
  }

  // client
  const client = obj['client'];
  if (client !== undefined) {
    if (!isObject(client)) throw new Error(`${filePath}: "client" must be an object`);
    config.client = {};
    const timeout = client['timeout'];
    if (timeout !== undefined) {
      if (typeof timeout !== 'number' || timeout <= 0) throw new Error(`${filePath}: "client.timeout" must be a positive number`);
      config.client.timeout = timeout;
    }
  }

  return config;
}

export function writeProjectConfig(projectDir: string, config: ProjectConfig): void {
  const filePath = join(projectDir, CONFIG_FILENAME);
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n');
}

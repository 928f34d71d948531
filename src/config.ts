import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import {
  BUFFER_SIZE,
  HELLO_PORT,
  LISTEN_BACKLOG,
  MAX_CLIENTS,
  MUX_PORT,
} from './constants.js';

/**
 * Multiplexed server settings.
 */
export interface MuxConfig {
  host: string;
  port: number;
  backlog: number;
  capacity: number;
  bufferSize: number;
}

/**
 * Handshake server settings.
 */
export interface HelloConfig {
  host: string;
  port: number;
}

/**
 * Status API settings; the API only runs when this section is present.
 */
export interface StatusConfig {
  host: string;
  port: number;
}

/**
 * Normalized slotmux configuration.
 * Use loadConfig() to read it from a file and the environment.
 */
export interface SlotmuxConfig {
  mux: MuxConfig;
  hello: HelloConfig;
  status?: StatusConfig;
}

/**
 * Default config file path: SLOTMUX_CONFIG env or ~/.config/slotmux/config.json
 */
export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SLOTMUX_CONFIG) {
    return resolve(env.SLOTMUX_CONFIG);
  }
  return resolve(homedir(), '.config', 'slotmux', 'config.json');
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new Error(`Invalid config: ${key} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function portValue(value: unknown, name: string, fallback: number): number {
  if (value === undefined) return fallback;
  const port = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid config: ${name} must be a port number between 0 and 65535`);
  }
  return port;
}

function positiveInt(value: unknown, name: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid config: ${name} must be a positive integer`);
  }
  return value;
}

function hostValue(value: unknown, name: string, fallback: string): string {
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Invalid config: ${name} must be a non-empty string`);
  }
  return value;
}

/**
 * Normalize a parsed config object, filling in defaults and applying
 * SLOTMUX_PORT, SLOTMUX_HELLO_PORT and SLOTMUX_STATUS_PORT overrides.
 */
export function parseConfig(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): SlotmuxConfig {
  const rawMux = section(raw, 'mux') ?? {};
  const rawHello = section(raw, 'hello') ?? {};
  const rawStatus = section(raw, 'status');

  const mux: MuxConfig = {
    host: hostValue(rawMux.host, 'mux.host', '0.0.0.0'),
    port: portValue(env.SLOTMUX_PORT ?? rawMux.port, 'mux.port', MUX_PORT),
    backlog: positiveInt(rawMux.backlog, 'mux.backlog', LISTEN_BACKLOG),
    capacity: positiveInt(rawMux.capacity, 'mux.capacity', MAX_CLIENTS),
    bufferSize: positiveInt(rawMux.bufferSize, 'mux.bufferSize', BUFFER_SIZE),
  };

  const hello: HelloConfig = {
    host: hostValue(rawHello.host, 'hello.host', '0.0.0.0'),
    port: portValue(env.SLOTMUX_HELLO_PORT ?? rawHello.port, 'hello.port', HELLO_PORT),
  };

  let status: StatusConfig | undefined;
  const statusPort = env.SLOTMUX_STATUS_PORT ?? rawStatus?.port;
  if (statusPort !== undefined) {
    status = {
      host: hostValue(rawStatus?.host, 'status.host', '127.0.0.1'),
      port: portValue(statusPort, 'status.port', 0),
    };
  }

  return {
    mux,
    hello,
    ...(status ? { status } : {}),
  };
}

/**
 * Load configuration from a JSON file plus environment overrides.
 *
 * An explicitly given path must exist. The default path is optional: when
 * it is missing the built-in defaults apply.
 *
 * @throws Error if the file is missing (explicit path) or invalid
 */
export function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): SlotmuxConfig {
  const explicit = path !== undefined || env.SLOTMUX_CONFIG !== undefined;
  const configPath = path ? resolve(path) : getDefaultConfigPath(env);

  if (!existsSync(configPath)) {
    if (explicit) {
      throw new Error(`Config file not found at ${configPath}`);
    }
    return parseConfig({}, env);
  }

  const content = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${configPath}`);
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Invalid config: ${configPath} must contain a JSON object`);
  }

  return parseConfig(Object.fromEntries(Object.entries(parsed)), env);
}

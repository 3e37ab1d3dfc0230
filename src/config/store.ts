import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { GameConfig } from './schema';
import { validateAndRepair } from '@content/validate';
import { logger } from '@engine/logger';

const log = logger.child({ module: 'config' });

const DEFAULT_PATH = 'config/game.json';

let current: GameConfig = validateAndRepair({});
let hasHydrated = false;
let pendingLoad: Promise<GameConfig> | null = null;
const subs = new Set<(cfg: GameConfig) => void>();

function notify(cfg: GameConfig) {
  for (const fn of subs) fn(cfg);
}

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return resolve(env.SPELL_CONFIG_PATH || DEFAULT_PATH);
}

async function readFromDisk(path: string): Promise<GameConfig> {
  const text = await readFile(path, 'utf8');
  const payload: unknown = JSON.parse(text);
  return validateAndRepair(payload);
}

async function resolveLoad(path: string, force?: boolean): Promise<GameConfig> {
  if (!force && hasHydrated) {
    return current;
  }
  if (!force && pendingLoad) {
    return pendingLoad;
  }
  const request = readFromDisk(path)
    .then((cfg) => {
      current = cfg;
      hasHydrated = true;
      log.info(
        { path, spells: Object.keys(cfg.spells).length, creatures: Object.keys(cfg.creatures).length },
        'config loaded',
      );
      notify(cfg);
      return cfg;
    })
    .finally(() => {
      pendingLoad = null;
    });
  if (!force) {
    pendingLoad = request;
  }
  return request;
}

export async function load(options?: { path?: string; force?: boolean }): Promise<GameConfig> {
  return resolveLoad(options?.path ?? configPath(), options?.force);
}

export function applyConfig(cfg: GameConfig): GameConfig {
  current = validateAndRepair(cfg);
  hasHydrated = true;
  notify(current);
  return current;
}

export function exportConfig(): string {
  return JSON.stringify(current, null, 2);
}

export function importConfig(json: string): GameConfig {
  const parsed: unknown = JSON.parse(json);
  return applyConfig(validateAndRepair(parsed));
}

export function subscribe(fn: (cfg: GameConfig) => void) {
  subs.add(fn);
  if (hasHydrated) {
    fn(current);
  } else if (pendingLoad) {
    pendingLoad.then(fn).catch((err: unknown) => {
      log.warn({ err }, 'config load failed before subscriber was notified');
    });
  }
  return () => {
    subs.delete(fn);
  };
}

export const CONFIG = () => current;

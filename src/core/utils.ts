import fs from 'fs';
import path from 'path';
import { ConfigurationError } from './errors';
import { BacktestConfig, validateBacktestConfig } from './schema';

export const ensureDir = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const readJSONFile = (filePath: string): unknown => {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(raw);
};

export const writeJSONFile = (filePath: string, data: unknown) => {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
};

export const loadConfig = (configPath: string): BacktestConfig => {
  const result = validateBacktestConfig(readJSONFile(configPath));
  if (!result.success) {
    throw new ConfigurationError(`Invalid config ${configPath}: ${result.errors.join('; ')}`);
  }
  return result.value;
};

export const mulberry32 = (seed: number) => {
  let t = seed + 0x6d2b79f5;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

// FNV-1a, used to derive per-symbol seeds
export const hashString = (input: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

export const sum = (arr: number[]): number => arr.reduce((a, b) => a + b, 0);

export const average = (arr: number[]): number => (arr.length ? sum(arr) / arr.length : 0);

export const round2 = (value: number): number => Math.round(value * 100) / 100;

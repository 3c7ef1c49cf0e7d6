import fs from 'fs';
import path from 'path';
import { ConfigError } from '../../errors';

export interface ModuleSpec {
  /** Nameplate power at STC, W. */
  stcPowerW: number;
  /** Power temperature coefficient, 1/°C. */
  gammaPdc: number;
}

export interface InverterSpec {
  /** Maximum AC output, W. */
  pacoW: number;
  etaNominal: number;
}

export interface EquipmentCatalog {
  modules: ReadonlyMap<string, ModuleSpec>;
  inverters: ReadonlyMap<string, InverterSpec>;
}

function resolveDataDir(): string {
  const candidates = [
    path.join(__dirname, '..', '..', '..', 'data'),
    path.join(__dirname, '..', '..', '..', '..', 'data'),
  ];
  const found = candidates.find((dir) => fs.existsSync(path.join(dir, 'modules.json')));
  if (!found) {
    throw new Error('[catalog] data directory not found');
  }
  return found;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(entry: Record<string, unknown>, key: string, where: string): number {
  const value = entry[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`[catalog] ${where}.${key} must be a finite number`);
  }
  return value;
}

function readJson(file: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (!isRecord(parsed)) {
    throw new Error(`[catalog] ${path.basename(file)} must hold an object keyed by identifier`);
  }
  return parsed;
}

export function parseModules(raw: Record<string, unknown>): Map<string, ModuleSpec> {
  const modules = new Map<string, ModuleSpec>();
  for (const [name, entry] of Object.entries(raw)) {
    if (!isRecord(entry)) throw new Error(`[catalog] module ${name} must be an object`);
    modules.set(name, {
      stcPowerW: readNumber(entry, 'stcPowerW', name),
      gammaPdc: readNumber(entry, 'gammaPdc', name),
    });
  }
  return modules;
}

export function parseInverters(raw: Record<string, unknown>): Map<string, InverterSpec> {
  const inverters = new Map<string, InverterSpec>();
  for (const [name, entry] of Object.entries(raw)) {
    if (!isRecord(entry)) throw new Error(`[catalog] inverter ${name} must be an object`);
    inverters.set(name, {
      pacoW: readNumber(entry, 'pacoW', name),
      etaNominal: readNumber(entry, 'etaNominal', name),
    });
  }
  return inverters;
}

export function loadEquipmentCatalog(dataDir: string = resolveDataDir()): EquipmentCatalog {
  return {
    modules: parseModules(readJson(path.join(dataDir, 'modules.json'))),
    inverters: parseInverters(readJson(path.join(dataDir, 'inverters.json'))),
  };
}

export function lookupModule(catalog: EquipmentCatalog, name: string): ModuleSpec {
  const spec = catalog.modules.get(name);
  if (!spec) {
    throw new ConfigError('PV_MODULE_NAME', `"${name}" is not in the module catalog`);
  }
  return spec;
}

export function lookupInverter(catalog: EquipmentCatalog, name: string): InverterSpec {
  const spec = catalog.inverters.get(name);
  if (!spec) {
    throw new ConfigError('PV_INVERTER_NAME', `"${name}" is not in the inverter catalog`);
  }
  return spec;
}

// driver/registry.ts - Board Driver Registry & Dispatch

import { UsageError } from '@thermofuse/contracts';
import type { BoardDriver } from './types';

// =============================================================================
// Registry
// =============================================================================

export const driverRegistry = {
  simulated: () => import('./simulated'),
} as const;

export type DriverName = keyof typeof driverRegistry;

// Drivers hold open-board state, so one instance per name per process
const driverCache = new Map<DriverName, BoardDriver>();

// =============================================================================
// Runtime Access
// =============================================================================

export function isDriverRegistered(name: string): name is DriverName {
  return name in driverRegistry;
}

export function getAllDrivers(): DriverName[] {
  return Object.keys(driverRegistry).filter(isDriverRegistered);
}

export async function getDriver(name: string): Promise<BoardDriver> {
  if (!isDriverRegistered(name)) {
    throw new UsageError(`Board driver '${name}' not found (available: ${getAllDrivers().join(', ')})`, {
      details: { driver: name },
    });
  }

  const cached = driverCache.get(name);
  if (cached) return cached;

  const module = await driverRegistry[name]();
  const driver = module.default();

  driverCache.set(name, driver);
  return driver;
}

/** Test-only. */
export function clearDriverCache(): void {
  driverCache.clear();
}

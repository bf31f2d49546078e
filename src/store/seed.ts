// ═══════════════════════════════════════════════════════════════
// Store :: Seed Data
// Demo employees, openings, budgets and policies from config/seed.json
// ═══════════════════════════════════════════════════════════════

import fs from 'fs';
import { z } from 'zod';
import { CONFIG } from '../core/config.js';
import type { LoggerHandle } from '../core/types.js';
import type { EntityStore } from './entity-store.js';
import {
  AssetSchema, BudgetSchema, EmployeeSchema, JobPositionSchema, LicenseSchema, PolicySchema,
} from './schemas.js';

export const SeedSchema = z.object({
  employees: z.array(EmployeeSchema),
  jobPositions: z.array(JobPositionSchema),
  budgets: z.array(BudgetSchema),
  licenses: z.array(LicenseSchema),
  assets: z.array(AssetSchema),
  payScale: z.record(z.string(), z.number()),
  policies: z.array(PolicySchema),
});

export type SeedData = z.infer<typeof SeedSchema>;

export function loadSeedFile(file: string = CONFIG.data.seedPath): SeedData {
  return SeedSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
}

/** Populate an empty store. Returns false when the store already holds employees. */
export function applySeed(store: EntityStore, seed: SeedData, logger: LoggerHandle): boolean {
  if (store.employees.count() > 0) {
    logger.info('Store already populated, seed skipped');
    return false;
  }

  store.transaction(() => {
    seed.employees.forEach(e => store.employees.put(e));
    seed.jobPositions.forEach(j => store.jobPositions.put(j));
    seed.budgets.forEach(b => store.budgets.put(b));
    seed.licenses.forEach(l => store.licenses.put(l));
    seed.assets.forEach(a => store.assets.put(a));
    seed.policies.forEach(p => store.policies.put(p));
  });

  logger.info(`Seeded ${seed.employees.length} employees, ${seed.jobPositions.length} positions, ${seed.budgets.length} budgets, ${seed.policies.length} policies`);
  return true;
}

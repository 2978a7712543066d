/**
 * Equipment Catalog
 *
 * Slingshot definitions loaded from portfolio.json:
 *   { "default_slingshot": "...", "slingshots": [{ name, power, ... }] }
 */

import fs from 'fs';
import { z } from 'zod';
import { Equipment } from '../types';
import { ConfigurationError } from '../utils/errors';

export interface EquipmentCatalog {
    slingshots: readonly Equipment[];
    defaultSlingshot: string;
}

const slingshotSchema = z.object({
    name: z.string().min(1),
    power: z.number().nonnegative(),
    accuracy: z.number().min(0).max(1),
    dte: z.number().nonnegative(),
    option_type: z.enum(['call', 'put']),
    color: z.tuple([z.number(), z.number(), z.number()]),
    size: z.number().positive(),
    strike_bias: z.number().default(0),
});

const portfolioSchema = z.object({
    default_slingshot: z.string(),
    slingshots: z.array(slingshotSchema).min(1),
});

export function parseEquipmentCatalog(body: unknown): EquipmentCatalog {
    const result = portfolioSchema.safeParse(body);
    if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigurationError('invalid equipment catalog', { issues });
    }

    const slingshots: Equipment[] = result.data.slingshots.map((s) => ({
        name: s.name,
        power: s.power,
        accuracy: s.accuracy,
        dte: s.dte,
        optionType: s.option_type,
        color: s.color,
        size: s.size,
        strikeBias: s.strike_bias,
    }));

    return validateCatalog({ slingshots, defaultSlingshot: result.data.default_slingshot });
}

/**
 * Names must be unique and the default must exist
 */
export function validateCatalog(catalog: EquipmentCatalog): EquipmentCatalog {
    if (catalog.slingshots.length === 0) {
        throw new ConfigurationError('equipment catalog is empty');
    }

    const names = catalog.slingshots.map((s) => s.name);
    const duplicates = names.filter((name, i) => names.indexOf(name) !== i);
    if (duplicates.length > 0) {
        throw new ConfigurationError('duplicate slingshot names', { duplicates });
    }

    if (!names.includes(catalog.defaultSlingshot)) {
        throw new ConfigurationError(`unknown default slingshot: ${catalog.defaultSlingshot}`, { available: names });
    }

    return catalog;
}

export function loadEquipmentCatalog(filePath: string): EquipmentCatalog {
    let body: unknown;
    try {
        body = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(`cannot read equipment catalog ${filePath}: ${message}`);
    }
    return parseEquipmentCatalog(body);
}

export function findEquipment(catalog: EquipmentCatalog, name: string): Equipment | undefined {
    return catalog.slingshots.find((s) => s.name === name);
}

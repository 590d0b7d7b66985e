import { refineFactory, simpleRule } from '../convert/Rule';
import type { RuleFactory } from '../convert/Rule';
import type { SourceRecord } from '../types';

export const ODOO_CLIENT = 'Odoo';
export const NON_BILLABLE_TAG = 'non-billable';

/**
 * Time-tracker project names of the Odoo work categories
 */
export const OdooProjects = {
    onboarding: ['Odoo-onboarding'],
    training: ['Odoo-training'],
    owndb: ['Odoo-owndb'],
    misc: ['Odoo-misc'],
    improvement: ['Odoo-improvement'],
    coaching: ['Odoo-coaching'],
    review: ['Odoo-review'],
    task: ['Odoo-psbe', 'Odoo-maintenance'],
} as const;

export type OdooCategory = keyof typeof OdooProjects;

export function isNonBillable(record: SourceRecord): boolean {
    return record.tags.includes(NON_BILLABLE_TAG);
}

export function isOdooClient(record: SourceRecord): boolean {
    return record.project?.client?.name === ODOO_CLIENT;
}

export function inProjects(projects: readonly string[]): (record: SourceRecord) => boolean {
    return (record) => record.project !== undefined && projects.includes(record.project.name);
}

/**
 * Narrow a base rule to records of the Odoo client
 */
export function odooRule(base: RuleFactory = simpleRule): RuleFactory {
    return refineFactory(base, { name: 'odoo', matches: isOdooClient });
}

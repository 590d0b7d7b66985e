import type { ChainRegistry } from '../convert/ChainRegistry';
import type { ConversionChain } from '../convert/ConversionChain';
import { ForbiddenRecordError } from '../convert/errors';
import { refineFactory, simpleRule } from '../convert/Rule';
import type { RuleFactory } from '../convert/Rule';
import { TaskExtractor } from '../convert/TaskExtractor';
import type { SourceRecord, TimesheetLine } from '../types';
import { inProjects, isNonBillable, odooRule, OdooProjects } from './common';
import type { OdooCategory } from './common';

/**
 * Rules producing billable timesheet lines for the Odoo company timesheets.
 * Records tagged non-billable never reach this chain's transforms.
 */

interface CategoryRule {
    priority: number;
    category: OdooCategory;
    convert: (record: SourceRecord, line: TimesheetLine) => TimesheetLine;
}

const billableRule: RuleFactory = refineFactory(simpleRule, {
    name: 'billable',
    matches: (record) => !isNonBillable(record),
    convert: (record, line) => {
        if (isNonBillable(record)) {
            throw new ForbiddenRecordError(
                `Converting non-billable records for Odoo is forbidden: record #${record.id}`
            );
        }
        return line;
    },
});

const ODOO_RULES: CategoryRule[] = [
    {
        priority: 110,
        category: 'onboarding',
        convert: (record, line) => ({
            ...line,
            project: '(PS) INT. TRAINING',
            task: 'Training ABT',
            name: `[functional][onboarding] - ${record.description}`,
        }),
    },
    {
        priority: 120,
        category: 'training',
        convert: (record, line) => ({
            ...line,
            project: 811, // (PS) INT. TRAINING
            task: 'Training ABT',
            name: `[technical] ${record.description}`,
        }),
    },
    {
        priority: 180,
        category: 'owndb',
        convert: (record, line) => ({
            ...line,
            project: '(PS) INT. TRAINING',
            task: 'Training ABT',
            name: `[technical+functional] owndb: ${record.description}`,
        }),
    },
    {
        priority: 210,
        category: 'misc',
        convert: (_record, line) => ({ ...line, project: 821, task: '(PS) MISC' }),
    },
    {
        priority: 410,
        category: 'improvement',
        convert: (record, line) => {
            const { taskId, rest } = TaskExtractor.extract(record);
            return { ...line, project: '(PS) INT. IMPROVEMENT', task: taskId, name: rest };
        },
    },
    {
        priority: 510,
        category: 'coaching',
        convert: (_record, line) => ({ ...line, project: '(PS) COACHING', task: 2508170 }),
    },
    {
        priority: 610,
        category: 'review',
        convert: (_record, line) => ({ ...line, project: '(PS) COACHING', task: 'Code Review/PR Review' }),
    },
    {
        priority: 810,
        category: 'task',
        convert: (record, line) => {
            const { taskId, rest } = TaskExtractor.extract(record);
            // The task already belongs to the right project
            const next: TimesheetLine = { ...line, task: taskId, name: rest };
            delete next.project;
            return next;
        },
    },
];

export function registerOdooChain(registry: ChainRegistry, name = 'odoo'): ConversionChain {
    const chain = registry.create(name);
    const base = odooRule(billableRule);

    for (const rule of ODOO_RULES) {
        chain.register(rule.priority, refineFactory(base, {
            name: `${name}/${rule.category}`,
            matches: inProjects(OdooProjects[rule.category]),
            convert: rule.convert,
        }));
    }

    return chain;
}

import type { ChainRegistry } from '../convert/ChainRegistry';
import type { ConversionChain } from '../convert/ConversionChain';
import { refineFactory } from '../convert/Rule';
import type { RuleFactory, RuleRefinement } from '../convert/Rule';
import { TaskExtractor } from '../convert/TaskExtractor';
import type { SourceRecord } from '../types';
import { inProjects, isNonBillable, odooRule, OdooProjects } from './common';
import type { OdooCategory } from './common';

/**
 * Rules for the personal Odoo database, where every record is kept,
 * non-billable ones included, under a yearly "Odoo <year>" project.
 */

const yearlyProjectRule: RuleFactory = refineFactory(odooRule(), {
    name: 'odoo-yearly',
    convert: (_record, line) => ({ ...line, project: `Odoo ${line.date.slice(0, 4)}` }),
});

type FixedTaskCategory = Exclude<OdooCategory, 'onboarding' | 'task'>;

const TASKS: Record<FixedTaskCategory, string> = {
    training: 'Training (technical)',
    owndb: 'Training (owndb)',
    misc: 'Miscellaneous',
    improvement: 'Int. Improvement',
    coaching: 'Coaching',
    review: 'Code Review',
};

const PRIORITIES: Record<OdooCategory, number> = {
    onboarding: 110,
    training: 120,
    owndb: 180,
    misc: 210,
    improvement: 410,
    coaching: 510,
    review: 610,
    task: 810,
};

export const NON_BILLABLE_PRIORITY = 9999;

function taskLabel(record: SourceRecord): { task: string; name: string } {
    const { taskId, shortName, rest } = TaskExtractor.extract(record);
    return {
        task: shortName ? `[${taskId}] ${shortName}` : `[${taskId}]`,
        name: rest,
    };
}

export function registerOwndbChain(registry: ChainRegistry, name = 'owndb'): ConversionChain {
    const chain = registry.create(name);
    const register = (category: OdooCategory, factory: RuleFactory) =>
        chain.register(PRIORITIES[category], factory);
    const categoryRule = (category: OdooCategory, convert: RuleRefinement['convert']) =>
        refineFactory(yearlyProjectRule, {
            name: `${name}/${category}`,
            matches: inProjects(OdooProjects[category]),
            convert,
        });

    register('onboarding', categoryRule('onboarding', (record, line) => ({
        ...line,
        task: 'Training (functional)',
        name: `[onboarding] ${record.description}`,
    })));

    const fixedTaskCategories: FixedTaskCategory[] = ['training', 'owndb', 'misc', 'improvement', 'coaching', 'review'];
    for (const category of fixedTaskCategories) {
        const task = TASKS[category];
        register(category, categoryRule(category, (_record, line) => ({ ...line, task })));
    }

    register('task', categoryRule('task', (record, line) => ({ ...line, ...taskLabel(record) })));

    chain.register(NON_BILLABLE_PRIORITY, refineFactory(yearlyProjectRule, {
        name: `${name}/non-billable`,
        matches: isNonBillable,
        convert: (_record, line) => ({ ...line, task: 'Non-billable' }),
    }));

    return chain;
}

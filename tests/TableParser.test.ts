import { TableParser } from '../src/data/TableParser';
import { createRecord } from './helpers/records';

describe('TableParser', () => {
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        errorSpy.mockRestore();
    });

    describe('parseFile', () => {
        it('should parse a table with multiple records', () => {
            const content = `# 2024-01

| Id | Start | End | Description | Client | Project | Tags |
|----|-------|-----|-------------|--------|---------|------|
| 1 | 2024-01-15 09:00 | 2024-01-15 10:00 | Morning task | Odoo | Odoo-psbe | dev |
| 2 | 2024-01-15 14:00 | 2024-01-15 15:30 | Afternoon task | Odoo | | |
| 3 | 2024-01-16 10:00 | 2024-01-16 12:00 | Next day task | | | |
`;

            const records = TableParser.parseFile(content);

            expect(records.map(r => r.id)).toEqual([1, 2, 3]);
            expect(records.map(r => r.duration)).toEqual([3600, 5400, 7200]);
        });

        it('should parse a record with all fields', () => {
            const content = `| Id | Start | End | Description | Client | Project | Tags |
|----|-------|-----|-------------|--------|---------|------|
| 17 | 2024-01-15 09:15 | 2024-01-15 10:40 | [42: setup] fix bug | Odoo | Odoo-psbe | dev, urgent |
`;

            const [record] = TableParser.parseFile(content);

            expect(record).toEqual({
                id: 17,
                start: new Date(2024, 0, 15, 9, 15),
                stop: new Date(2024, 0, 15, 10, 40),
                duration: 85 * 60,
                description: '[42: setup] fix bug',
                project: { name: 'Odoo-psbe', client: { name: 'Odoo' } },
                tags: ['dev', 'urgent'],
            });
        });

        it('should match columns by header name in any order', () => {
            const content = `| description | id | end | start |
|---|---|---|---|
| Reordered | 5 | 2024-01-15 10:00 | 2024-01-15 09:30 |
`;

            const [record] = TableParser.parseFile(content);

            expect(record.id).toBe(5);
            expect(record.description).toBe('Reordered');
            expect(record.duration).toBe(1800);
            expect(record.project).toBeUndefined();
            expect(record.tags).toEqual([]);
        });

        it('should leave the client out of records without project', () => {
            const content = `| Id | Start | End | Description | Client | Project | Tags |
|----|-------|-----|-------------|--------|---------|------|
| 1 | 2024-01-15 09:00 | 2024-01-15 10:00 | Orphan | Odoo | | |
`;

            expect(TableParser.parseFile(content)[0].project).toBeUndefined();
        });

        it('should handle an empty file', () => {
            expect(TableParser.parseFile('')).toEqual([]);
        });

        it('should handle a table with only a header', () => {
            const content = `| Id | Start | End | Description | Client | Project | Tags |
|----|-------|-----|-------------|--------|---------|------|
`;

            expect(TableParser.parseFile(content)).toEqual([]);
        });

        it('should skip unusable rows with a warning', () => {
            const content = `| Id | Start | End | Description | Client | Project | Tags |
|----|-------|-----|-------------|--------|---------|------|
| 1 | 2024-01-15 09:00 | 2024-01-15 10:00 | Valid | | | |
| | 2024-01-15 11:00 | 2024-01-15 12:00 | Missing id | | | |
| x7 | 2024-01-15 11:00 | 2024-01-15 12:00 | Bad id | | | |
| 3 | 2024-01-15 | 2024-01-15 12:00 | Bad start | | | |
| 4 | 2024-01-15 12:00 | 2024-01-15 11:00 | Backwards | | | |
`;

            const records = TableParser.parseFile(content);

            expect(records.map(r => r.description)).toEqual(['Valid']);
            expect(errorSpy).toHaveBeenCalledTimes(4);
            expect(errorSpy).toHaveBeenCalledWith(
                '[timesheet-bridge]',
                'WARNING:',
                'TableParser: row 5 ends before it starts, skipping'
            );
        });
    });

    describe('generateTable', () => {
        it('should generate a markdown table with every column', () => {
            const result = TableParser.generateTable([
                createRecord({ description: 'Task 1', tags: ['dev', 'urgent'] }),
            ]);

            expect(result).toMatch(/^\| Id\s+\| Start\s+\| End\s+\| Description\s+\| Client\s+\| Project\s+\| Tags\s+\|/);
            expect(result).toContain('2024-01-02 09:00');
            expect(result).toContain('Task 1');
            expect(result).toContain('Odoo-psbe');
            expect(result).toContain('dev, urgent');
        });

        it('should parse back to the same records', () => {
            const records = [
                createRecord({ id: 1 }),
                createRecord({
                    id: 2,
                    start: new Date(2024, 0, 2, 23, 30),
                    stop: new Date(2024, 0, 3, 0, 45),
                    duration: 4500,
                    description: 'Late | night',
                    project: undefined,
                    tags: ['non-billable'],
                }),
            ];

            expect(TableParser.parseFile(TableParser.generateTable(records))).toEqual(records);
        });
    });

    describe('utility functions', () => {
        it('formatDateTime should format correctly', () => {
            expect(TableParser.formatDateTime(new Date(2024, 0, 5, 7, 3))).toBe('2024-01-05 07:03');
        });

        it('parseDateTime should parse a valid datetime', () => {
            expect(TableParser.parseDateTime('2024-01-15 09:30')).toEqual(new Date(2024, 0, 15, 9, 30));
        });

        it('parseDateTime should return null for an invalid format', () => {
            expect(TableParser.parseDateTime('2024-01-15')).toBeNull();
            expect(TableParser.parseDateTime('09:30')).toBeNull();
            expect(TableParser.parseDateTime('')).toBeNull();
        });
    });
});

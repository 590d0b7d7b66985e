import unified from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkStringify from 'remark-stringify';
import type { AlignType, Root, Table, TableCell, TableRow } from 'mdast';
import type { Node } from 'unist';
import type { SourceRecord } from '../types';
import { Logger } from '../utils/Logger';

/**
 * Parses and serializes source records kept in markdown tables via mdast/remark
 *
 * Format (one or more tables per month file):
 * | Id | Start | End | Description | Client | Project | Tags |
 * |----|-------|-----|-------------|--------|---------|------|
 * | 17 | 2024-01-15 09:15 | 2024-01-15 10:40 | [42: setup] fix bug | Odoo | Odoo-psbe | dev, urgent |
 *
 * Columns are matched by header name, case-insensitively, in any order.
 */
export class TableParser {
    /** Expected column headers */
    static readonly HEADERS = ['Id', 'Start', 'End', 'Description', 'Client', 'Project', 'Tags'];

    /** Create the unified processor for parsing */
    private static createParser() {
        return unified()
            .use(remarkParse)
            .use(remarkGfm);
    }

    /** Create the unified processor for serializing */
    private static createSerializer() {
        return unified()
            .use(remarkParse)
            .use(remarkGfm)
            .use(remarkStringify, {
                bullet: '-',
                fence: '`',
                fences: true,
                incrementListMarker: false,
            });
    }

    /**
     * Parse markdown content into source records, in table order
     */
    static parseFile(content: string): SourceRecord[] {
        const records: SourceRecord[] = [];
        const tree = this.createParser().parse(content);

        if (!isRoot(tree)) {
            return records;
        }

        for (const node of tree.children) {
            if (node.type === 'table') {
                records.push(...this.parseTable(node));
            }
        }

        return records;
    }

    /**
     * Parse a table node into SourceRecord array
     */
    private static parseTable(table: Table): SourceRecord[] {
        const records: SourceRecord[] = [];
        const rows = table.children;

        if (rows.length < 2) {
            return records; // Need at least header + one data row
        }

        const headerMap = this.getHeaderMap(rows[0]);

        for (let i = 1; i < rows.length; i++) {
            const record = this.parseRow(rows[i], headerMap, i);
            if (record) {
                records.push(record);
            }
        }

        return records;
    }

    /**
     * Build a map of header name -> column index
     */
    private static getHeaderMap(headerRow: TableRow): Map<string, number> {
        const map = new Map<string, number>();
        headerRow.children.forEach((cell, index) => {
            map.set(this.getCellText(cell).toLowerCase(), index);
        });
        return map;
    }

    /**
     * Parse a table row into a SourceRecord, or null when the row is unusable
     */
    private static parseRow(row: TableRow, headerMap: Map<string, number>, rowIndex: number): SourceRecord | null {
        const cells = row.children;

        const getValue = (header: string): string => {
            const index = headerMap.get(header.toLowerCase());
            if (index === undefined || index >= cells.length) return '';
            return this.getCellText(cells[index]);
        };

        const idStr = getValue('id');
        const startStr = getValue('start');
        const endStr = getValue('end');

        if (!idStr || !startStr || !endStr) {
            Logger.warn(`TableParser: row ${rowIndex} is missing required fields (id, start or end), skipping`);
            return null;
        }

        if (!/^\d+$/.test(idStr)) {
            Logger.warn(`TableParser: row ${rowIndex} has an invalid id "${idStr}", skipping`);
            return null;
        }

        const start = this.parseDateTime(startStr);
        const stop = this.parseDateTime(endStr);

        if (!start || !stop) {
            Logger.warn(`TableParser: row ${rowIndex} has an invalid datetime format, skipping`);
            return null;
        }

        if (stop < start) {
            Logger.warn(`TableParser: row ${rowIndex} ends before it starts, skipping`);
            return null;
        }

        const projectName = getValue('project');
        const clientName = getValue('client');
        const tagsStr = getValue('tags');

        return {
            id: Number(idStr),
            start,
            stop,
            duration: Math.round((stop.getTime() - start.getTime()) / 1000),
            description: getValue('description'),
            project: projectName
                ? { name: projectName, client: clientName ? { name: clientName } : undefined }
                : undefined,
            tags: tagsStr
                ? tagsStr.split(',').map(t => t.trim()).filter(t => t.length > 0)
                : [],
        };
    }

    /**
     * Get text content from a table cell
     */
    private static getCellText(cell: TableCell): string {
        return cell.children.map(child => this.getNodeText(child)).join('').trim();
    }

    /**
     * Recursively get text from any node
     */
    private static getNodeText(node: unknown): string {
        if (!node || typeof node !== 'object') return '';

        if ('value' in node && typeof node.value === 'string') {
            return node.value;
        }

        if ('children' in node && Array.isArray(node.children)) {
            return node.children.map((child: unknown) => this.getNodeText(child)).join('');
        }

        return '';
    }

    /**
     * Parse datetime string "YYYY-MM-DD HH:mm" (local time) into Date
     */
    static parseDateTime(str: string): Date | null {
        const match = str.match(/^(\d{4})-(\d{2})-(\d{2})\s+(\d{2}):(\d{2})$/);
        if (!match) {
            return null;
        }

        const [, year, month, day, hours, minutes] = match.map(Number);
        return new Date(year, month - 1, day, hours, minutes);
    }

    /**
     * Format a Date to "YYYY-MM-DD HH:mm" string for table cells
     */
    static formatDateTime(date: Date): string {
        const pad = (n: number) => n.toString().padStart(2, '0');
        return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
    }

    /**
     * Generate markdown table content from records
     */
    static generateTable(records: readonly SourceRecord[]): string {
        const rows: string[][] = records.map(record => [
            String(record.id),
            this.formatDateTime(record.start),
            this.formatDateTime(record.stop),
            record.description,
            record.project?.client?.name ?? '',
            record.project?.name ?? '',
            record.tags.join(', '),
        ]);
        return this.stringifyTable(this.HEADERS, rows);
    }

    /**
     * Serialize a header row plus data rows as a GFM table
     */
    static stringifyTable(headers: readonly string[], rows: readonly string[][]): string {
        const tableRows: TableRow[] = [headers, ...rows].map((cells): TableRow => ({
            type: 'tableRow',
            children: cells.map(text => this.createCell(text)),
        }));

        const table: Table = {
            type: 'table',
            align: headers.map((): AlignType => 'left'),
            children: tableRows,
        };

        const root: Root = {
            type: 'root',
            children: [table],
        };

        return this.createSerializer().stringify(root);
    }

    /**
     * Create a table cell with text content
     */
    private static createCell(text: string): TableCell {
        return {
            type: 'tableCell',
            children: [{ type: 'text', value: text }],
        };
    }
}

function isRoot(node: Node): node is Root {
    return node.type === 'root';
}

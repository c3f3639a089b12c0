import { Summarizer, SummaryItem } from './types';
import { parseReply } from './reply-parser';

export interface LineSummarizerOptions {
    /** Append a `total : <n> <unit>` line when every item is an inventory figure in one unit. */
    totals?: boolean;
}

// `<label> : <text>` per item, the way farm yields are reported.
export class LineSummarizer implements Summarizer {
    constructor(private readonly options: LineSummarizerOptions = {}) { }

    async merge(items: SummaryItem[]): Promise<string> {
        const lines = items.map(item => `${item.label} : ${item.text.trim()}`);
        if (this.options.totals && items.length > 1) {
            const total = inventoryTotal(items);
            if (total) lines.push(`total : ${total}`);
        }
        return lines.join('\n');
    }
}

function inventoryTotal(items: SummaryItem[]): string | null {
    let sum = 0;
    let unit: string | null = null;
    for (const item of items) {
        const parsed = parseReply(item.text);
        if (parsed.kind !== 'inventory') return null;
        if (unit !== null && unit !== parsed.unit) return null;
        unit = parsed.unit;
        sum += parsed.quantity;
    }
    return unit === null ? null : `${sum} ${unit}`;
}

export interface ReportSummarizerOptions {
    title?: string;
    sectionHeading?: string;
    footer?: string;
}

/** Markdown digest: header with source count, one section per source, footer. */
export class ReportSummarizer implements Summarizer {
    private readonly title: string;
    private readonly sectionHeading: string;
    private readonly footer: string;

    constructor(options: ReportSummarizerOptions = {}) {
        this.title = options.title ?? 'News Digest - Aggregated Report';
        this.sectionHeading = options.sectionHeading ?? 'Source';
        this.footer = options.footer ?? '*Aggregated report generated by switchyard*';
    }

    async merge(items: SummaryItem[]): Promise<string> {
        const parts = [
            `# ${this.title}`,
            '',
            `**Sources Analyzed:** ${items.length}`,
            '',
            '---',
            '',
        ];
        items.forEach((item, idx) => {
            parts.push(`## ${this.sectionHeading} ${idx + 1}: ${item.label}`, '', item.text.trim(), '', '---', '');
        });
        parts.push(this.footer);
        return parts.join('\n');
    }
}

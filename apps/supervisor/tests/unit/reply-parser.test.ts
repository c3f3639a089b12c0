import { parseReply } from '../../src/aggregation/reply-parser';
import { LineSummarizer, ReportSummarizer } from '../../src/aggregation/summarizers';
import { extractStatus, LogisticsStatus } from '../../src/decomposition/logistics-status';

describe('parseReply', () => {
    it('reads inventory figures', () => {
        expect(parseReply('5000 lbs')).toEqual({ kind: 'inventory', quantity: 5000, unit: 'lbs' });
        expect(parseReply(' 45,000 Pounds. ')).toEqual({ kind: 'inventory', quantity: 45000, unit: 'pounds' });
    });

    it('reads order confirmations', () => {
        expect(parseReply('order_id: abc-123')).toEqual({ kind: 'order', orderId: 'abc-123' });
        expect(parseReply('Your Order ID = XYZ9')).toEqual({ kind: 'order', orderId: 'XYZ9' });
    });

    it('reads logistics transitions with the order reference', () => {
        expect(parseReply('DELIVERED | shipper -> Supervisor: Order o-7 Delivered to customer')).toEqual({
            kind: 'logistics',
            status: LogisticsStatus.DELIVERED,
            orderId: 'o-7',
        });
        expect(parseReply('PAYMENT_COMPLETE')).toEqual({ kind: 'logistics', status: LogisticsStatus.PAYMENT_COMPLETE });
    });

    it('falls back to text', () => {
        expect(parseReply('  The farm is closed today.  ')).toEqual({ kind: 'text', text: 'The farm is closed today.' });
        expect(parseReply('')).toEqual({ kind: 'text', text: '' });
    });
});

describe('extractStatus', () => {
    it('picks the earliest status token', () => {
        expect(extractStatus('CUSTOMS_CLEARANCE then DELIVERED')).toBe(LogisticsStatus.CUSTOMS_CLEARANCE);
        expect(extractStatus('nothing here')).toBe(LogisticsStatus.STATUS_UNKNOWN);
    });
});

describe('summarizers', () => {
    it('adds an inventory total when every figure shares a unit', async () => {
        const summarizer = new LineSummarizer({ totals: true });
        expect(await summarizer.merge([
            { label: 'brazil', recipient: 'brazil', text: '8500 lbs' },
            { label: 'colombia', recipient: 'colombia', text: '5000 lbs' },
        ])).toBe('brazil : 8500 lbs\ncolombia : 5000 lbs\ntotal : 13500 lbs');
    });

    it('skips the total for mixed replies', async () => {
        const summarizer = new LineSummarizer({ totals: true });
        expect(await summarizer.merge([
            { label: 'brazil', recipient: 'brazil', text: '8500 lbs' },
            { label: 'colombia', recipient: 'colombia', text: '200 kg' },
        ])).toBe('brazil : 8500 lbs\ncolombia : 200 kg');
    });

    it('builds a markdown report', async () => {
        const report = await new ReportSummarizer({ title: 'Digest', footer: '*end*' }).merge([
            { label: 'https://a.test/1', recipient: 'scraper', text: 'Summary of https://a.test/1' },
            { label: 'https://b.test/2', recipient: 'scraper', text: 'Summary of https://b.test/2' },
        ]);
        expect(report).toBe([
            '# Digest',
            '',
            '**Sources Analyzed:** 2',
            '',
            '---',
            '',
            '## Source 1: https://a.test/1',
            '',
            'Summary of https://a.test/1',
            '',
            '---',
            '',
            '## Source 2: https://b.test/2',
            '',
            'Summary of https://b.test/2',
            '',
            '---',
            '',
            '*end*',
        ].join('\n'));
    });
});

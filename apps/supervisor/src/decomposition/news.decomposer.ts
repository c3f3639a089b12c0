import { InvalidRequestError } from '../errors/run.errors';
import { RunRequest } from '../supervisor/types';
import { Decomposer, DispatchPlan, unicast } from './types';

const URL_PATTERN = /https?:\/\/[^\s<>"')\]]+/g;

export function extractUrls(text: string): string[] {
    return (text.match(URL_PATTERN) ?? []).map(url => url.replace(/[.,;:!?]+$/, ''));
}

// Keeps well-formed http(s) URLs, first occurrence wins.
export function validateUrls(urls: string[]): string[] {
    const seen = new Set<string>();
    const valid: string[] = [];
    for (const raw of urls) {
        const candidate = raw.trim();
        let parsed: URL;
        try {
            parsed = new URL(candidate);
        } catch {
            continue;
        }
        if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') continue;
        if (seen.has(candidate)) continue;
        seen.add(candidate);
        valid.push(candidate);
    }
    return valid;
}

export interface NewsDecomposerOptions {
    scraper?: string;
}

/** One scrape task per distinct URL, all sent to the scraper worker. */
export class NewsDecomposer implements Decomposer {
    private readonly scraper: string;

    constructor(options: NewsDecomposerOptions = {}) {
        this.scraper = options.scraper ?? 'scraper';
    }

    decompose(request: RunRequest): DispatchPlan {
        const urls = validateUrls([...extractUrls(request.prompt), ...(request.urls ?? [])]);
        if (urls.length === 0) {
            throw new InvalidRequestError('No valid URLs found. Please provide URLs to scrape.');
        }
        return {
            tasks: urls.map(url => unicast(this.scraper, `scrape ${url}`, url)),
            tolerance: 'partial',
        };
    }
}

import { renameSync, writeFileSync } from 'fs';
import { logger } from '../config/logger.js';
import type { FeedItem } from './items.js';

export interface FeedChannel {
    title: string;
    link: string;
    description: string;
}

const XML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&apos;',
};

export function escapeXml(text: string): string {
    return text.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

function element(name: string, text: string, attributes = ''): string {
    return `<${name}${attributes}>${escapeXml(text)}</${name}>`;
}

function renderItem(item: FeedItem): string {
    return [
        '    <item>',
        `      ${element('title', item.title)}`,
        `      ${element('link', item.link)}`,
        `      ${element('guid', item.guid, ' isPermaLink="false"')}`,
        `      ${element('pubDate', item.pubDate.toUTCString())}`,
        `      ${element('description', item.description)}`,
        '    </item>',
    ].join('\n');
}

export function renderRss(channel: FeedChannel, items: readonly FeedItem[], buildDate: Date): string {
    return [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<rss version="2.0">',
        '  <channel>',
        `    ${element('title', channel.title)}`,
        `    ${element('link', channel.link)}`,
        `    ${element('description', channel.description)}`,
        `    ${element('lastBuildDate', buildDate.toUTCString())}`,
        ...items.map(renderItem),
        '  </channel>',
        '</rss>',
        '',
    ].join('\n');
}

export interface FeedSink {
    publish(items: readonly FeedItem[], buildDate: Date): void;
}

/**
 * Rewrites the whole feed document on every run.
 */
export class FeedPublisher implements FeedSink {
    constructor(
        private readonly path: string,
        private readonly channel: FeedChannel,
    ) { }

    publish(items: readonly FeedItem[], buildDate: Date): void {
        const tmpPath = `${this.path}.tmp`;
        writeFileSync(tmpPath, renderRss(this.channel, items, buildDate), 'utf-8');
        renameSync(tmpPath, this.path);

        logger.info({ path: this.path, items: items.length }, 'Feed written');
    }
}

import * as cheerio from 'cheerio';

export interface Hyperlink {
    link: string;
    text?: string;
}

/** Every `<a href>` on the page, in document order, with its visible text. Hrefs are returned as written. */
export function extractHyperlinks(html: string): Hyperlink[] {
    const $ = cheerio.load(html);
    const links: Hyperlink[] = [];

    $('a[href]').each((_, el) => {
        const href = $(el).attr('href');
        if (!href) return;
        const text = $(el).text().replace(/\s+/g, ' ').trim();
        links.push({ link: href, ...(text ? { text } : {}) });
    });

    return links;
}

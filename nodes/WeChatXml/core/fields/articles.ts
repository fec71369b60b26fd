import { MAX_ARTICLES } from '../constants';
import { ArticlesLimitError, CodecErrorFactory, type FieldErrorContext } from '../errors';
import type { FieldKind } from '../types';
import { describeValue, toText } from '../utils';
import { isPlainObject, leafText, rawElement, textElement, toArray } from '../xml';
import { fieldFactory } from './field';

export type Article = {
    title?: string;
    description?: string;
    image?: string;
    url?: string;
};

// Rendered order of an <item>
const ARTICLE_PARTS = [
    { key: 'title', tag: 'Title' },
    { key: 'description', tag: 'Description' },
    { key: 'image', tag: 'PicUrl' },
    { key: 'url', tag: 'Url' },
] as const;

export function assertArticleCount(count: number): void {
    if (count > MAX_ARTICLES) throw new ArticlesLimitError(count, MAX_ARTICLES);
}

function readArticle(raw: unknown, index: number, ctx: FieldErrorContext): Article {
    if (!isPlainObject(raw)) {
        throw CodecErrorFactory.value(ctx, `article #${index + 1} must be a mapping, found ${describeValue(raw)}`);
    }
    const article: Article = {};
    for (const { key } of ARTICLE_PARTS) {
        const v = raw[key];
        if (v !== undefined && v !== null) article[key] = toText(v);
    }
    return article;
}

function readArticles(raw: unknown, ctx: FieldErrorContext): Article[] | undefined {
    if (raw === undefined || raw === null) return undefined;
    if (!Array.isArray(raw)) {
        throw CodecErrorFactory.value(ctx, `expected a list of articles, found ${describeValue(raw)}`);
    }
    return raw.map((item, i) => readArticle(item, i, ctx));
}

function decodeItem(node: unknown, index: number, ctx: FieldErrorContext): Article {
    if (!isPlainObject(node)) {
        throw CodecErrorFactory.decode(ctx, `<item> #${index + 1} has no elements`);
    }
    const article: Article = {};
    for (const { key, tag } of ARTICLE_PARTS) {
        const v = node[tag];
        article[key] = v === undefined ? '' : leafText(v) ?? '';
    }
    return article;
}

/**
 * Up to ten articles, rendered as `<ArticleCount>` followed by `<Articles>`.
 */
export const ArticlesKind: FieldKind<Article[]> = {
    name: 'Articles',
    read: readArticles,
    decode: (node, ctx) => {
        if (node === '' || node === undefined) return [];
        if (!isPlainObject(node)) {
            throw CodecErrorFactory.decode(ctx, `expected <item> elements, found ${describeValue(node)}`);
        }
        const items = toArray(node.item).map((item, i) => decodeItem(item, i, ctx));
        assertArticleCount(items.length);
        return items;
    },
    encode: (value, ctx) => {
        const articles = readArticles(value ?? ctx.defaultValue, ctx) ?? [];
        const items = articles.map((article) =>
            rawElement('item', ARTICLE_PARTS.map(({ key, tag }) => textElement(tag, article[key] ?? '')).join('')),
        );
        return `${rawElement('ArticleCount', String(articles.length))}\n${rawElement(ctx.wireName, items.join(''))}`;
    },
    check: (value, ctx) => {
        if (value === undefined || value === null) return;
        if (!Array.isArray(value)) {
            throw CodecErrorFactory.value(ctx, `expected a list of articles, found ${describeValue(value)}`);
        }
        assertArticleCount(value.length);
    },
};

export const articlesField = fieldFactory(ArticlesKind);

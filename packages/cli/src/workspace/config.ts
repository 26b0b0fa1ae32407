import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { ConfigError } from '@ledgerlens/shared';
import { createKeywordTable, parseKeywordTableInput, type KeywordTable } from '@ledgerlens/core';

/**
 * Loads the keyword table from a YAML file.
 */
export function loadKeywordTable(path: string): KeywordTable {
    if (!existsSync(path)) {
        throw new ConfigError(`Keyword file not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    return keywordTableFromYaml(content, path);
}

/**
 * Builds a keyword table from YAML text.
 *
 * Supports either a wrapped mapping { categories: { Name: [...] } } or the
 * bare category mapping. A list of { category, keywords } entries also works.
 * Mappings are read as Maps so category order survives even for
 * integer-like names.
 */
export function keywordTableFromYaml(content: string, origin: string): KeywordTable {
    let data: unknown;
    try {
        data = parse(content, { mapAsMap: true });
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Cannot parse ${origin}: ${reason}`, { cause: err });
    }

    if (data === null || data === undefined) {
        throw new ConfigError(`Keyword file is empty: ${origin}`);
    }

    let categories: unknown = data;
    if (data instanceof Map && data.has('categories')) {
        categories = data.get('categories');
    }

    const input = categories instanceof Map
        ? [...categories].map(([name, keywords]: [unknown, unknown]) => [String(name), toPlain(keywords)])
        : toPlain(categories);

    return createKeywordTable(parseKeywordTableInput(input));
}

function toPlain(value: unknown): unknown {
    if (value instanceof Map) {
        const entries: Iterable<[unknown, unknown]> = value;
        const out: Record<string, unknown> = {};
        for (const [key, inner] of entries) {
            out[String(key)] = toPlain(inner);
        }
        return out;
    }
    if (Array.isArray(value)) {
        return value.map(toPlain);
    }
    return value;
}

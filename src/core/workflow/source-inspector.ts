/**
 * Source inspector — deterministic facts about a program's text.
 *
 * Import extraction, documentation-marker detection, unwrapping fenced
 * model output, and checking that documentation only added lines.
 *
 * Dependency direction: source-inspector.ts → config types
 * Used by: research and document agents
 */

import type { SourceLanguage } from '../config/types.js';

/** Substrings that count as existing documentation, per language. */
const DOCUMENTATION_MARKERS: Record<SourceLanguage, readonly RegExp[]> = {
    python: [/"""/, /'''/, /#/],
    javascript: [/\/\*/, /(^|\s)\/\//m],
};

/** Code fence language tags each language's output may carry. */
const FENCE_TAGS: Record<SourceLanguage, readonly string[]> = {
    python: ['python', 'py', 'python3'],
    javascript: ['javascript', 'js', 'typescript', 'ts', 'jsx', 'tsx'],
};

/** Line-comment prefixes, used when matching lines that gained a trailing comment. */
const LINE_COMMENT: Record<SourceLanguage, string> = {
    python: '#',
    javascript: '//',
};

/**
 * Whether the code already contains a documentation marker.
 */
export function hasDocumentation(code: string, language: SourceLanguage): boolean {
    return DOCUMENTATION_MARKERS[language].some((marker) => marker.test(code));
}

/**
 * List imported libraries in the order they appear, without duplicates.
 *
 * python: `import a, b as c` → a, b; `from m import x, y` → m.x, m.y
 * javascript: static imports, side-effect imports, `require()` and dynamic `import()`
 */
export function extractLibraries(code: string, language: SourceLanguage): string[] {
    const found = language === 'python' ? extractPythonImports(code) : extractJavaScriptImports(code);
    return [...new Set(found)];
}

/**
 * Pull code out of a model response.
 *
 * Prefers a fence tagged with the language, then any fence, then the
 * whole response. The result is trimmed.
 */
export function extractCodeBlock(response: string, language: SourceLanguage): string {
    for (const tag of FENCE_TAGS[language]) {
        const tagged = new RegExp('```' + tag + '[ \\t]*\\r?\\n([\\s\\S]*?)```').exec(response);
        if (tagged?.[1] !== undefined) {
            return tagged[1].trim();
        }
    }

    const anyFence = /```[\w+-]*[ \t]*\r?\n([\s\S]*?)```/.exec(response);
    if (anyFence?.[1] !== undefined) {
        return anyFence[1].trim();
    }

    return response.trim();
}

/**
 * Source lines missing from the documented version.
 *
 * A line counts as kept when the documented code has the same line
 * (ignoring indentation), optionally followed by a line comment.
 */
export function findDroppedLines(source: string, documented: string, language: SourceLanguage): string[] {
    const comment = LINE_COMMENT[language];
    const documentedLines = documented.split(/\r?\n/).map((line) => line.trim());

    return source
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line !== '')
        .filter((line) => !documentedLines.some((candidate) => isSameLine(line, candidate, comment)));
}

// ── Private helpers ──

function isSameLine(original: string, candidate: string, comment: string): boolean {
    if (candidate === original) return true;
    if (!candidate.startsWith(original)) return false;
    return candidate.slice(original.length).trimStart().startsWith(comment);
}

function extractPythonImports(code: string): string[] {
    const libraries: string[] = [];

    for (const statement of splitPythonStatements(code)) {
        const plain = /^import\s+(.+)$/.exec(statement);
        if (plain?.[1]) {
            for (const name of importedNames(plain[1])) libraries.push(name);
            continue;
        }

        const fromImport = /^from\s+\.*([\w.]*)\s+import\s+(.+)$/.exec(statement);
        if (fromImport?.[2] !== undefined) {
            const module = fromImport[1] ?? '';
            for (const name of importedNames(fromImport[2].replace(/[()]/g, ''))) {
                libraries.push(`${module}.${name}`);
            }
        }
    }

    return libraries;
}

/** `a, b as c` → a, b */
function importedNames(list: string): string[] {
    return list
        .split(',')
        .map((part) => part.trim().split(/\s+as\s+/)[0]?.trim() ?? '')
        .filter((name) => name !== '');
}

/**
 * Split python source into logical statements on one line each.
 *
 * String literal contents and comments are dropped. Statements end at a
 * newline outside brackets or at `;`; a backslash before the newline
 * continues the statement.
 */
function splitPythonStatements(code: string): string[] {
    const statements: string[] = [];
    let current = '';
    let quote: string | undefined;
    let depth = 0;

    const flush = (): void => {
        const statement = current.trim();
        if (statement !== '') statements.push(statement);
        current = '';
    };

    let i = 0;
    while (i < code.length) {
        const ch = code.charAt(i);

        if (quote !== undefined) {
            if (ch === '\\') {
                i += 2;
            } else if (code.startsWith(quote, i)) {
                i += quote.length;
                quote = undefined;
            } else if (ch === '\n' && quote.length === 1) {
                // Unterminated single-line string
                quote = undefined;
            } else {
                i++;
            }
            continue;
        }

        if (ch === '"' || ch === "'") {
            const triple = ch.repeat(3);
            quote = code.startsWith(triple, i) ? triple : ch;
            current += '""';
            i += quote.length;
            continue;
        }

        if (ch === '#') {
            while (i < code.length && code.charAt(i) !== '\n') i++;
            continue;
        }

        if (ch === '\\' && /^\\\r?\n/.test(code.slice(i, i + 3))) {
            current += ' ';
            i += code.charAt(i + 1) === '\r' ? 3 : 2;
            continue;
        }

        if (ch === '\n') {
            if (depth > 0) current += ' ';
            else flush();
        } else if (ch === ';' && depth === 0) {
            flush();
        } else if (ch !== '\r') {
            if ('([{'.includes(ch)) depth++;
            if (')]}'.includes(ch) && depth > 0) depth--;
            current += ch;
        }
        i++;
    }
    flush();

    return statements;
}

function extractJavaScriptImports(code: string): string[] {
    const patterns = [
        /\bimport\s+(?:[\w*{}\s,$]+?\s+from\s+)?['"]([^'"]+)['"]/g,
        /\bexport\s+[\w*{}\s,$]+?\s+from\s+['"]([^'"]+)['"]/g,
        /\brequire\(\s*['"]([^'"]+)['"]\s*\)/g,
        /\bimport\(\s*['"]([^'"]+)['"]\s*\)/g,
    ];

    const hits: Array<{ index: number; name: string }> = [];
    for (const pattern of patterns) {
        for (const match of code.matchAll(pattern)) {
            if (match[1]) hits.push({ index: match.index ?? 0, name: match[1] });
        }
    }

    return hits.sort((a, b) => a.index - b.index).map((hit) => hit.name);
}

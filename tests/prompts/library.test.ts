/**
 * Tests for the YAML prompt store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
    DEFAULT_PROMPTS,
    PROMPT_KEYS,
    generateDefaultPrompts,
    getPromptsPath,
    loadPrompts,
    parsePrompts,
} from '../../src/prompts/library.js';
import { ConfigError } from '../../src/core/errors.js';

let testDir: string;

beforeEach(() => {
    testDir = join(tmpdir(), `docflow-prompts-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
});

afterEach(() => {
    if (existsSync(testDir)) {
        rmSync(testDir, { recursive: true, force: true });
    }
});

describe('parsePrompts', () => {
    it('reads all three prompts', () => {
        const prompts = parsePrompts(
            ['research_prompt: Research it.', 'document_prompt: Document it.', 'analyze_prompt: |', '  Analyze it.', '  Carefully.'].join(
                '\n',
            ),
        );

        expect(prompts).toEqual({
            research_prompt: 'Research it.',
            document_prompt: 'Document it.',
            analyze_prompt: 'Analyze it.\nCarefully.',
        });
    });

    it('throws ConfigError naming a missing key', () => {
        expect(() => parsePrompts('research_prompt: a\ndocument_prompt: b\n', 'prompts.yaml')).toThrow(
            /Invalid prompt file prompts\.yaml:\n {2}- analyze_prompt: Required/,
        );
    });

    it('throws ConfigError for an empty document', () => {
        expect(() => parsePrompts('')).toThrow(ConfigError);
    });

    it('throws ConfigError for malformed YAML', () => {
        expect(() => parsePrompts('research_prompt: [unclosed', 'bad.yaml')).toThrow(/Failed to parse bad\.yaml/);
    });
});

describe('loadPrompts', () => {
    it('falls back to the built-in prompts when the file is missing', () => {
        expect(loadPrompts(testDir, 'prompts.yaml')).toEqual(DEFAULT_PROMPTS);
    });

    it('reads the project prompt file', () => {
        writeFileSync(
            join(testDir, 'custom.yaml'),
            'research_prompt: r\ndocument_prompt: d\nanalyze_prompt: a\n',
            'utf-8',
        );
        expect(loadPrompts(testDir, 'custom.yaml')).toEqual({
            research_prompt: 'r',
            document_prompt: 'd',
            analyze_prompt: 'a',
        });
    });

    it('rejects a prompt file with a blank prompt', () => {
        writeFileSync(join(testDir, 'prompts.yaml'), 'research_prompt: r\ndocument_prompt: " "\nanalyze_prompt: a\n');
        expect(() => loadPrompts(testDir, 'prompts.yaml')).toThrow(ConfigError);
    });
});

describe('generateDefaultPrompts', () => {
    it('writes defaults that load back unchanged', () => {
        expect(generateDefaultPrompts(testDir, 'prompts.yaml')).toBe(true);

        const loaded = loadPrompts(testDir, 'prompts.yaml');
        for (const key of PROMPT_KEYS) {
            expect(loaded[key]).toBe(DEFAULT_PROMPTS[key].trim());
        }
    });

    it('preserves an existing file', () => {
        const path = getPromptsPath(testDir, 'prompts.yaml');
        writeFileSync(path, 'research_prompt: mine\n', 'utf-8');

        expect(generateDefaultPrompts(testDir, 'prompts.yaml')).toBe(false);
        expect(readFileSync(path, 'utf-8')).toBe('research_prompt: mine\n');
    });
});

describe('getPromptsPath', () => {
    it('keeps absolute paths', () => {
        const absolute = join(testDir, 'p.yaml');
        expect(getPromptsPath('/elsewhere', absolute)).toBe(absolute);
    });

    it('resolves relative paths against the project root', () => {
        expect(getPromptsPath(testDir, 'p.yaml')).toBe(join(testDir, 'p.yaml'));
    });
});

/**
 * File system helpers with consistent error handling.
 *
 * Reads raise ConfigError (inputs the user points us at), writes of
 * workflow results raise OutputError.
 *
 * Dependency direction: fs.ts → node:fs, node:path, errors.ts
 * Used by: config manager, prompt store, output writer, CLI commands
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { ConfigError, OutputError, errorMessage } from '../core/errors.js';

/**
 * Read a JSON file and parse it.
 * @throws {ConfigError} if the file doesn't exist or contains invalid JSON.
 */
export function readJsonFile(filePath: string): unknown {
    const content = readTextFile(filePath);

    try {
        return JSON.parse(content);
    } catch (err) {
        throw new ConfigError(`Failed to parse JSON file: ${resolve(filePath)}`, {
            filePath: resolve(filePath),
            originalError: errorMessage(err),
        });
    }
}

/**
 * Write data to a JSON file, creating parent directories if needed.
 * @throws {OutputError} if the write fails.
 */
export function writeJsonFile(filePath: string, data: unknown): void {
    writeTextFile(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Write a text file, replacing any existing content.
 * Parent directories are created as needed.
 * @throws {OutputError} if the write fails.
 */
export function writeTextFile(filePath: string, content: string): void {
    const absolutePath = resolve(filePath);

    try {
        ensureDir(dirname(absolutePath));
        writeFileSync(absolutePath, content, 'utf-8');
    } catch (err) {
        throw new OutputError(`Failed to write file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: errorMessage(err),
        });
    }
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export function ensureDir(dirPath: string): void {
    const absolutePath = resolve(dirPath);
    if (!existsSync(absolutePath)) {
        mkdirSync(absolutePath, { recursive: true });
    }
}

/**
 * Check if a file exists at the given path.
 */
export function fileExists(filePath: string): boolean {
    return existsSync(resolve(filePath));
}

/**
 * Read a text file and return its contents.
 * @throws {ConfigError} if the file doesn't exist or cannot be read.
 */
export function readTextFile(filePath: string): string {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`File not found: ${absolutePath}`, { filePath: absolutePath });
    }

    try {
        return readFileSync(absolutePath, 'utf-8');
    } catch (err) {
        throw new ConfigError(`Failed to read file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: errorMessage(err),
        });
    }
}

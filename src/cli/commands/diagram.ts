/**
 * `docflow diagram` — Print or save the workflow graph as Mermaid.
 *
 * Dependency direction: diagram.ts → commander, workflow/diagram, config module
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { renderMermaid } from '../../core/workflow/diagram.js';
import { getDefaultConfig, loadConfig } from '../../core/config/manager.js';
import { writeTextFile } from '../../utils/fs.js';
import { errorMessage } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

export const diagramCommand = new Command('diagram')
    .description('Render the workflow graph as a Mermaid flowchart')
    .option('-w, --write [file]', 'Write the diagram to a file instead of stdout')
    .action((options: { write?: string | boolean }) => {
        const mermaid = renderMermaid();

        if (!options.write) {
            process.stdout.write(mermaid);
            return;
        }

        try {
            const projectRoot = process.cwd();
            const target = typeof options.write === 'string' ? options.write : diagramFile(projectRoot);
            const path = resolve(projectRoot, target);
            writeTextFile(path, mermaid);
            logger.success(`Workflow diagram saved to ${path}`);
        } catch (err) {
            logger.error(errorMessage(err));
            process.exit(1);
        }
    });

/** Configured diagram path, or the default when the config cannot be loaded. */
function diagramFile(projectRoot: string): string {
    try {
        return loadConfig(projectRoot).output.diagramFile;
    } catch (err) {
        logger.debug(`Using default diagram path: ${errorMessage(err)}`);
        return getDefaultConfig().output.diagramFile;
    }
}

/**
 * Tests for the Mermaid diagram renderer.
 */

import { describe, it, expect } from 'vitest';
import { renderMermaid } from '../../../src/core/workflow/diagram.js';

describe('renderMermaid', () => {
    it('renders the workflow graph', () => {
        expect(renderMermaid()).toBe(
            [
                'flowchart TD',
                '    __start__([start]) --> research',
                '    research -. undocumented .-> document',
                '    research -. documented .-> analyze',
                '    document --> analyze',
                '    analyze --> final',
                '    final --> __end__([end])',
                '',
            ].join('\n'),
        );
    });

    it('renders custom edges', () => {
        expect(renderMermaid([{ from: 'analyze', to: '__end__', condition: 'skip' }])).toBe(
            'flowchart TD\n    analyze -. skip .-> __end__([end])\n',
        );
    });
});

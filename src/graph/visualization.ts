/**
 * Text renderings of a graph's structure: Mermaid flowcharts, Graphviz DOT and
 * a plain ASCII tree.
 */

import type { End, GraphEdge } from './types';
import { END } from './types';

export interface GraphStructure<S extends object> {
    nodes: ReadonlyArray<string>;
    edges: ReadonlyArray<GraphEdge<S>>;
    entryPoint: string | null;
}

export interface MermaidOptions {
    /** Flowchart direction (default: 'TD') */
    direction?: 'TD' | 'TB' | 'BT' | 'LR' | 'RL';
}

const RESERVED_IDS = new Set(['START', 'END']);

function mermaidId(name: string): string {
    const id = name.replace(/[^A-Za-z0-9_]/g, '_');
    return RESERVED_IDS.has(id) ? `${id}_node` : id;
}

function targetId(target: string | End, idOf: (name: string) => string): string {
    return target === END ? 'END' : idOf(target);
}

function referencesEnd<S extends object>(edges: ReadonlyArray<GraphEdge<S>>): boolean {
    return edges.some(edge => edge.kind === 'static'
        ? edge.to === END
        : (edge.targets ?? []).includes(END));
}

/** `"` is the only character a Mermaid quoted label cannot hold */
function mermaidLabel(name: string): string {
    return name.replace(/"/g, '#quot;');
}

export function drawMermaid<S extends object>(graph: GraphStructure<S>, options: MermaidOptions = {}): string {
    const lines: string[] = [`flowchart ${options.direction ?? 'TD'}`];

    if (graph.entryPoint !== null) {
        lines.push('    START(["START"])');
        lines.push('    style START fill:#90EE90');
        lines.push(`    START --> ${mermaidId(graph.entryPoint)}`);
    }

    for (const name of graph.nodes) {
        lines.push(`    ${mermaidId(name)}["${mermaidLabel(name)}"]`);
    }

    if (referencesEnd(graph.edges)) {
        lines.push('    END(["END"])');
        lines.push('    style END fill:#FFB6C1');
    }

    for (const edge of graph.edges) {
        const from = mermaidId(edge.from);
        if (edge.kind === 'static') {
            lines.push(`    ${from} --> ${targetId(edge.to, mermaidId)}`);
        } else if (edge.targets && edge.targets.length > 0) {
            for (const target of edge.targets) {
                lines.push(`    ${from} -.-> ${targetId(target, mermaidId)}`);
            }
        } else {
            lines.push(`    ${from} -.-> ${from}_condition((?))`);
            lines.push(`    style ${from}_condition fill:#FFFFE0,stroke:#333,stroke-dasharray: 5 5`);
        }
    }

    if (graph.entryPoint !== null) {
        lines.push(`    style ${mermaidId(graph.entryPoint)} fill:#87CEEB`);
    }

    return lines.join('\n') + '\n';
}

function dotId(name: string): string {
    return JSON.stringify(name);
}

export function drawDot<S extends object>(graph: GraphStructure<S>): string {
    const lines: string[] = [
        'digraph G {',
        '    rankdir=TD;',
        '    node [shape=box];',
    ];

    if (graph.entryPoint !== null) {
        lines.push('    START [label="START", shape=ellipse, style=filled, fillcolor=lightgreen];');
        lines.push(`    START -> ${dotId(graph.entryPoint)};`);
    }

    for (const name of graph.nodes) {
        lines.push(name === graph.entryPoint
            ? `    ${dotId(name)} [style=filled, fillcolor=lightblue];`
            : `    ${dotId(name)};`);
    }

    if (referencesEnd(graph.edges)) {
        lines.push('    END [label="END", shape=ellipse, style=filled, fillcolor=lightpink];');
    }

    for (const edge of graph.edges) {
        const from = dotId(edge.from);
        if (edge.kind === 'static') {
            lines.push(`    ${from} -> ${targetId(edge.to, dotId)};`);
        } else if (edge.targets && edge.targets.length > 0) {
            for (const target of edge.targets) {
                lines.push(`    ${from} -> ${targetId(target, dotId)} [style=dashed];`);
            }
        } else {
            const condition = dotId(`${edge.from}_condition`);
            lines.push(`    ${from} -> ${condition} [style=dashed, label="?"];`);
            lines.push(`    ${condition} [label="?", shape=diamond, style=filled, fillcolor=lightyellow];`);
        }
    }

    lines.push('}');
    return lines.join('\n') + '\n';
}

/** `null` stands for a route whose destinations were not declared */
type AsciiChild = string | End | null;

function asciiLabel(child: AsciiChild): string {
    if (child === null) return '(?)';
    return child === END ? 'END' : child;
}

function asciiChildren<S extends object>(graph: GraphStructure<S>, node: string): AsciiChild[] {
    const children = new Map<string, AsciiChild>();
    for (const edge of graph.edges) {
        if (edge.from !== node) continue;
        const targets: AsciiChild[] = edge.kind === 'static'
            ? [edge.to]
            : edge.targets && edge.targets.length > 0 ? [...edge.targets] : [null];
        for (const target of targets) {
            children.set(asciiLabel(target), target);
        }
    }
    return [...children.keys()].sort().map(label => children.get(label) ?? null);
}

/**
 * Depth-first tree from the entry point. A node reached a second time is
 * marked `(cycle)` and not expanded again.
 */
export function drawAscii<S extends object>(graph: GraphStructure<S>): string {
    if (graph.entryPoint === null) {
        return 'No entry point set\n';
    }

    const lines = ['Graph Execution Flow:', '├── START'];
    const visited = new Set<string>();

    const walk = (child: AsciiChild, prefix: string, isLast: boolean): void => {
        const line = `${prefix}${isLast ? '└──' : '├──'} ${asciiLabel(child)}`;
        if (child === null || child === END) {
            lines.push(line);
            return;
        }
        if (visited.has(child)) {
            lines.push(`${line} (cycle)`);
            return;
        }
        visited.add(child);
        lines.push(line);

        const childPrefix = prefix + (isLast ? '    ' : '│   ');
        const children = asciiChildren(graph, child);
        children.forEach((next, index) => walk(next, childPrefix, index === children.length - 1));
    };

    walk(graph.entryPoint, '│   ', true);
    return lines.join('\n') + '\n';
}

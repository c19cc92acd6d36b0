/**
 * Runtime Event Renderer for CLI
 *
 * The coordinator run is the top-level box; subagent lines are tagged with
 * the subagent's name, since parallel runs interleave.
 */

import type { RuntimeEvent, RuntimeEventCallback } from '@conclave/agent-contracts';

// ═══════════════════════════════════════════════════════════════════════════
// ANSI Colors & Symbols
// ═══════════════════════════════════════════════════════════════════════════

const CSI = '\x1b[';
const RESET = '\x1b[0m';

type Paint = (text: string) => string;

interface Palette {
  success: Paint;
  error: Paint;
  warning: Paint;
  dim: Paint;
  bold: Paint;
  /** Coordinator */
  accent: Paint;
  /** Subagents */
  primary: Paint;
  /** Tools */
  highlight: Paint;
}

const ansi = (code: string): Paint => (text) => `${CSI}${code}m${text}${RESET}`;

const COLORS: Palette = {
  success: ansi('32'),
  error: ansi('31'),
  warning: ansi('33'),
  dim: ansi('90'),
  bold: ansi('1'),
  accent: ansi('38;5;99'),
  primary: ansi('38;5;39'),
  highlight: ansi('38;5;51'),
};

const plain: Paint = (text) => text;

const NO_COLORS: Palette = {
  success: plain,
  error: plain,
  warning: plain,
  dim: plain,
  bold: plain,
  accent: plain,
  primary: plain,
  highlight: plain,
};

const box = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
};

const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  thinking: '◆',
  tool: '⚙',
  subagent: '◈',
  agent: '●',
};

// ═══════════════════════════════════════════════════════════════════════════
// Helper Functions
// ═══════════════════════════════════════════════════════════════════════════

export function formatDuration(ms: number): string {
  if (ms < 1000) {return `${ms}ms`;}
  if (ms < 60000) {return `${(ms / 1000).toFixed(1)}s`;}
  return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`;
}

function clip(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

function renderBoxTop(title: string, paint: Paint, width = 60): string {
  const rightPad = width - 2 - title.length - 4;
  return paint(`${box.topLeft}${box.horizontal.repeat(2)} ${title} ${box.horizontal.repeat(Math.max(0, rightPad))}${box.topRight}`);
}

function renderBoxBottom(paint: Paint, width = 60): string {
  return paint(`${box.bottomLeft}${box.horizontal.repeat(width - 2)}${box.bottomRight}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// Event Renderer Factory
// ═══════════════════════════════════════════════════════════════════════════

export interface EventRendererOptions {
  /** Show model turns, tool output and truncation notices */
  verbose?: boolean;
  /** Name of the top-level run (default 'coordinator') */
  rootAgent?: string;
  color?: boolean;
  /** Default: console.log */
  print?: (line: string) => void;
}

export function createEventRenderer(options: EventRendererOptions = {}): RuntimeEventCallback {
  const { verbose = false, rootAgent = 'coordinator', color: useColor = true, print = (line: string) => console.log(line) } = options;
  const color = useColor ? COLORS : NO_COLORS;

  const linePrefix = (agentName: string): string =>
    agentName === rootAgent
      ? `${color.accent(box.vertical)} `
      : `${color.accent(box.vertical)}   ${color.primary(`[${agentName}]`)} `;

  const line = (event: RuntimeEvent, text: string) => print(`${linePrefix(event.agentName)}${text}`);

  return (event: RuntimeEvent) => {
    const isRoot = event.agentName === rootAgent;

    switch (event.type) {
      // ═══════════════════════════════════════════════════════════════════
      // RUN LEVEL
      // ═══════════════════════════════════════════════════════════════════
      case 'run:start': {
        if (isRoot) {
          print(renderBoxTop(event.agentName.toUpperCase(), color.accent));
          line(event, `Task: ${color.bold(clip(event.data.input, 50))}`);
          line(event, color.dim(`Model: ${event.data.model} | Tools: ${event.data.toolCount} | Max iterations: ${event.data.maxIterations}`));
        } else {
          line(event, `${symbols.agent} ${clip(event.data.input, 60)}`);
        }
        break;
      }

      case 'run:end': {
        const { state, reason, iterations, tokensUsed, durationMs } = event.data;
        const status = state === 'failed'
          ? color.error(`${symbols.error} ${state} (${reason})`)
          : color.success(`${symbols.success} ${state} (${reason})`);
        line(event, `${status} ${color.dim(`${formatDuration(durationMs)}, ${iterations} iterations, ${tokensUsed} tokens`)}`);
        if (isRoot) {
          print(renderBoxBottom(color.accent));
        }
        break;
      }

      // ═══════════════════════════════════════════════════════════════════
      // LLM
      // ═══════════════════════════════════════════════════════════════════
      case 'llm:start': {
        break;
      }

      case 'llm:end': {
        if (verbose) {
          line(event, `${color.accent(symbols.thinking)} Thought ${color.dim(`(${formatDuration(event.data.durationMs)}, ${event.data.tokensUsed} tok)`)}`);
          if (event.data.content.trim()) {
            line(event, color.dim(`  "${clip(event.data.content, 150)}"`));
          }
        }
        break;
      }

      case 'llm:retry': {
        line(
          event,
          color.warning(`${symbols.warning} Model call failed (attempt ${event.data.attempt}), retrying in ${formatDuration(event.data.delayMs)}: ${clip(event.data.error, 80)}`),
        );
        break;
      }

      // ═══════════════════════════════════════════════════════════════════
      // TOOL EXECUTION
      // ═══════════════════════════════════════════════════════════════════
      case 'tool:start': {
        break;
      }

      case 'tool:end': {
        const status = event.data.success ? color.success(symbols.success) : color.error(symbols.error);
        line(event, `${color.highlight(`${symbols.tool} ${event.data.toolName}`)} ${status} ${color.dim(formatDuration(event.data.durationMs))}`);
        if (!event.data.success) {
          line(event, color.error(`    └─ ${clip(event.data.output, 100)}`));
        } else if (verbose && event.data.output.trim()) {
          line(event, color.dim(`    └─ ${clip(event.data.output, 200)}`));
        }
        break;
      }

      // ═══════════════════════════════════════════════════════════════════
      // HISTORY & SUBAGENTS
      // ═══════════════════════════════════════════════════════════════════
      case 'history:truncated': {
        if (verbose) {
          line(event, color.dim(`History truncated: ${event.data.droppedMessages} messages dropped (${event.data.totalDropped} total)`));
        }
        break;
      }

      case 'subagent:state': {
        print(`${color.accent(box.vertical)} ${color.primary(`${symbols.subagent} ${event.agentName}: ${event.data.from} → ${event.data.to}`)}`);
        break;
      }
    }
  };
}

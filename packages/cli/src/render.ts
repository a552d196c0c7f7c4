import type { CLIErrorView } from '@openapi-ir/core';

type Style = 'bold' | 'dim' | 'red' | 'yellow' | 'cyan';

const SGR: Record<Style, string> = {
  bold: '1',
  dim: '2',
  red: '31',
  yellow: '33',
  cyan: '36',
};

/** Continuation lines start under the text after the section icon */
const HANGING_INDENT = 3;

interface Section {
  text: string;
  style: Style;
  wrap: boolean;
}

function paint(text: string, styles: readonly Style[], enabled: boolean): string {
  if (!enabled) return text;
  return `\u001B[${styles.map((style) => SGR[style]).join(';')}m${text}\u001B[0m`;
}

function wrap(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/).filter((part) => part.length > 0)) {
    const candidate = line ? `${line} ${word}` : word;
    if (line && candidate.length > width) {
      lines.push(line);
      line = `${' '.repeat(HANGING_INDENT)}${word}`;
    } else {
      line = candidate;
    }
  }
  if (line) lines.push(line);
  return lines;
}

function sectionsOf(view: CLIErrorView): Section[] {
  const sections: Section[] = [];
  if (view.location) {
    sections.push({ text: `📍 ${view.location}`, style: 'cyan', wrap: true });
  }
  if (view.ref) {
    // kept on one line for copy/paste
    sections.push({ text: `🔗 Reference: ${view.ref}`, style: 'cyan', wrap: false });
  }
  if (view.workaround) {
    sections.push({
      text: `💡 Workaround: ${view.workaround}`,
      style: 'yellow',
      wrap: true,
    });
  }
  return sections;
}

/**
 * Error block for the terminal: the failing error with its location, then
 * one line per further error collected in the same run.
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines = [paint(`❌ ${view.title}`, ['bold', 'red'], view.colors)];

  for (const section of sectionsOf(view)) {
    const body = section.wrap ? wrap(section.text, width) : [section.text];
    lines.push(...body.map((line) => paint(line, [section.style], view.colors)));
  }

  const details = view.details ?? [];
  if (details.length > 0) {
    lines.push(paint(`Also failed (${details.length}):`, ['bold'], view.colors));
    lines.push(...details.map((detail) => paint(`  - ${detail}`, ['dim'], view.colors)));
  }

  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  // eslint-disable-next-line no-control-regex
  return input.replace(/\u001B\[[\d;]*m/g, '');
}

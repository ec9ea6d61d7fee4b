/**
 * @fileoverview 터미널 출력 (ANSI 24비트 색상, 대체 화면)
 */

import { BrailleCell } from '../render/braille-renderer';
import { RGB } from '../render/color';

const ESC = '\x1b[';

export const ansi = {
  enterAltScreen: `${ESC}?1049h`,
  leaveAltScreen: `${ESC}?1049l`,
  hideCursor: `${ESC}?25l`,
  showCursor: `${ESC}?25h`,
  clear: `${ESC}2J`,
  reset: `${ESC}0m`,
  moveTo: (col: number, row: number): string => `${ESC}${row + 1};${col + 1}H`,
  fg: ({ r, g, b }: RGB): string => `${ESC}38;2;${r};${g};${b}m`,
  clearLine: `${ESC}2K`,
};

export interface TerminalSize {
  columns: number;
  rows: number;
}

export interface Terminal {
  size(): TerminalSize;
  /** 글리프 캔버스 크기 (하단 2줄은 상태/키 안내) */
  canvasSize(): TerminalSize;
  enter(): void;
  leave(): void;
  drawFrame(cells: readonly BrailleCell[], statusLines: readonly string[]): void;
  onResize(callback: () => void): () => void;
}

export const STATUS_ROWS = 2;

/**
 * 글리프 셀 목록 → 한 프레임 문자열. 같은 색이 이어지면 색 코드를 생략한다.
 */
export function composeFrame(
  cells: readonly BrailleCell[],
  statusLines: readonly string[],
  size: TerminalSize
): string {
  let out = ansi.clear;
  let lastColor = '';
  let lastRow = -1;
  let lastCol = -1;

  for (const cell of cells) {
    if (cell.y !== lastRow || cell.x !== lastCol + 1) {
      out += ansi.moveTo(cell.x, cell.y);
    }
    const color = ansi.fg(cell.color);
    if (color !== lastColor) {
      out += color;
      lastColor = color;
    }
    out += cell.char;
    lastRow = cell.y;
    lastCol = cell.x;
  }

  out += ansi.reset;
  const firstStatusRow = Math.max(size.rows - statusLines.length, 0);
  statusLines.forEach((line, i) => {
    out += ansi.moveTo(0, firstStatusRow + i) + ansi.clearLine + line.slice(0, size.columns);
  });

  return out;
}

export function createTerminal(output: NodeJS.WriteStream = process.stdout): Terminal {
  function size(): TerminalSize {
    return { columns: output.columns ?? 80, rows: output.rows ?? 24 };
  }

  function canvasSize(): TerminalSize {
    const { columns, rows } = size();
    return { columns: Math.max(columns, 1), rows: Math.max(rows - STATUS_ROWS, 1) };
  }

  function enter(): void {
    output.write(ansi.enterAltScreen + ansi.hideCursor + ansi.clear);
  }

  function leave(): void {
    output.write(ansi.reset + ansi.showCursor + ansi.leaveAltScreen);
  }

  function drawFrame(cells: readonly BrailleCell[], statusLines: readonly string[]): void {
    output.write(composeFrame(cells, statusLines, size()));
  }

  function onResize(callback: () => void): () => void {
    output.on('resize', callback);
    return () => {
      output.off('resize', callback);
    };
  }

  return { size, canvasSize, enter, leave, drawFrame, onResize };
}

import { IReceiptRenderer } from './IReceiptRenderer.js';

const RULE_WIDTH = 40;

// plain-text receipts; columns padded to the widest cell
export class ReceiptPrinter implements IReceiptRenderer {
  render(
    headers: string[],
    rows: string[][],
    total: string,
    customerName: string,
    savings?: string
  ): string {
    const widths = headers.map((header, col) =>
      Math.max(header.length, ...rows.map(row => (row[col] ?? '').length))
    );

    const lines = [
      '='.repeat(RULE_WIDTH),
      `Customer: ${customerName}`,
      '-'.repeat(RULE_WIDTH),
      this.formatRow(headers, widths),
    ];

    for (const row of rows) {
      lines.push(this.formatRow(row.slice(0, headers.length), widths));
      // notes past the last column go on their own line
      for (const extra of row.slice(headers.length)) {
        lines.push(`  ${extra}`);
      }
    }

    lines.push('-'.repeat(RULE_WIDTH), `Total: ${total}`);
    if (savings !== undefined) {
      lines.push(`You saved: ${savings}`);
    }
    lines.push('='.repeat(RULE_WIDTH));

    return lines.join('\n');
  }

  renderPending(): string {
    return 'No receipt available: transaction is still active.';
  }

  private formatRow(cells: string[], widths: number[]): string {
    return cells
      .map((cell, col) => cell.padEnd(widths[col] ?? cell.length))
      .join('  ')
      .trimEnd();
  }
}

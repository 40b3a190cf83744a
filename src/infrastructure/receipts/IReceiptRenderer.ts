export interface IReceiptRenderer {
  render(
    headers: string[],
    rows: string[][],
    total: string,
    customerName: string,
    savings?: string
  ): string;
  renderPending(): string;
}

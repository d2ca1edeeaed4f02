import type { ScanHistoryEntry } from '@rxstock/types';

export const MAX_SCAN_HISTORY = 10;

/**
 * Recently scanned barcodes for one session
 *
 * Immutable: `record` returns a new history. Most recent first, at most
 * ten entries, one entry per barcode. Scanning a barcode again moves it to
 * the front with the new timestamp.
 */
export class ScanHistory {
  private constructor(private readonly items: readonly ScanHistoryEntry[]) {}

  static empty(): ScanHistory {
    return new ScanHistory([]);
  }

  static from(entries: readonly ScanHistoryEntry[]): ScanHistory {
    return entries.reduceRight<ScanHistory>(
      (history, entry) => history.record(entry.barcode, entry.scannedAt),
      ScanHistory.empty()
    );
  }

  record(barcode: string, scannedAt: Date = new Date()): ScanHistory {
    const code = barcode.trim();
    if (code === '') {
      return this;
    }
    const rest = this.items.filter((entry) => entry.barcode !== code);
    return new ScanHistory([{ barcode: code, scannedAt }, ...rest].slice(0, MAX_SCAN_HISTORY));
  }

  entries(): readonly ScanHistoryEntry[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  has(barcode: string): boolean {
    return this.items.some((entry) => entry.barcode === barcode.trim());
  }

  latest(): ScanHistoryEntry | undefined {
    return this.items[0];
  }
}

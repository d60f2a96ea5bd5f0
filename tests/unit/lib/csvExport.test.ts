import { describe, it, expect } from '@jest/globals';
import { toCsv } from '@/lib/csvExport';
import { makeTable } from '@/lib/table';
import { Cell, MISSING, UNDEFINED } from '@/types/dashboard';

describe('toCsv', () => {
  it('writes a header and one line per row', () => {
    const table = makeTable<Cell>(
      ['sku', 'revenue', 'flag'],
      [
        { sku: 'SKU-01', revenue: 1.5, flag: true },
        { sku: 'SKU-02', revenue: 20, flag: false },
      ],
    );
    expect(toCsv(table)).toBe('sku,revenue,flag\nSKU-01,1.5,true\nSKU-02,20,false');
  });

  it('leaves sentinel and missing cells empty', () => {
    const table = makeTable<Cell>(
      ['shop', 'aov', 'rate'],
      [{ shop: 'eBay', aov: MISSING, rate: UNDEFINED }, { shop: null }],
    );
    expect(toCsv(table)).toBe('shop,aov,rate\neBay,,\n,,');
  });

  it('quotes values containing the delimiter', () => {
    const table = makeTable<Cell>(['brand'], [{ brand: 'Alpha, Ltd' }]);
    expect(toCsv(table)).toBe('brand\n"Alpha, Ltd"');
  });

  it('writes only the header for an empty table', () => {
    expect(toCsv(makeTable<Cell>(['a', 'b'], []))).toBe('a,b');
  });
});

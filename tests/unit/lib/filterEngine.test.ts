import { describe, it, expect } from '@jest/globals';
import {
  applyFilters,
  applyPredicates,
  buildPredicates,
  categoricalPredicate,
  defaultFilterSpec,
  filterOptions,
  filterPrimary,
  rangePredicate,
} from '@/lib/filterEngine';
import { parseCsv, preparePrimaryTable } from '@/lib/datasetLoader';
import { FatalConfigurationError } from '@/lib/errors';
import { FilterSpec, Predicate, Table } from '@/types/dashboard';
import { tableOf } from '../../helpers';

const primary: Table = tableOf([
  { YearMonth: '2024-01', Company: 'Acme', Brands: 'Alpha', shop: 'Amazon', has_coupon: true, orders: 10 },
  { YearMonth: '2024-02', Company: 'Acme', Brands: 'Beta', shop: 'eBay', has_coupon: false, orders: 5 },
  { YearMonth: '2024-02', Company: 'Zenith', Brands: 'Alpha', shop: 'Amazon', has_coupon: false, orders: 7 },
  { YearMonth: '2024-03', Company: null, Brands: 'Gamma', shop: 'Amazon', has_coupon: true, orders: 2 },
  { YearMonth: null, Company: 'Acme', Brands: 'Alpha', shop: 'eBay', has_coupon: true, orders: 1 },
]);

function orders(table: Table): unknown[] {
  return table.rows.map((r) => r.orders);
}

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest]),
  );
}

function spec(overrides: Partial<FilterSpec> = {}): FilterSpec {
  return {
    yearMonth: { from: '2024-01', to: '2024-03' },
    company: [],
    brands: [],
    shop: [],
    shippingCountry: [],
    campaignType: [],
    hasCoupon: 'all',
    ...overrides,
  };
}

describe('FilterEngine', () => {
  describe('range predicate', () => {
    it('keeps both ends of the range inclusive', () => {
      const result = applyFilters(primary, rangePredicate('YearMonth', '2024-02', '2024-03'), []);
      expect(orders(result)).toEqual([5, 7, 2]);
    });

    it('drops rows whose key is missing', () => {
      const result = applyFilters(primary, rangePredicate('YearMonth', '2000-01', '2099-12'), []);
      expect(result.rows).toHaveLength(4);
    });

    it('is skipped when the key column is absent', () => {
      const result = applyFilters(primary, rangePredicate('Week', 1, 2), []);
      expect(result.rows).toHaveLength(primary.rows.length);
    });
  });

  describe('categorical predicate', () => {
    it('keeps rows whose value is selected', () => {
      const result = applyPredicates(primary, [categoricalPredicate('Company', ['Zenith'])]);
      expect(orders(result)).toEqual([7]);
    });

    it('excludes missing values when the selection is non-empty', () => {
      const result = applyPredicates(primary, [categoricalPredicate('Company', ['Acme', 'Zenith'])]);
      expect(orders(result)).toEqual([10, 5, 7, 1]);
    });

    it('treats an empty selection as omitting the predicate', () => {
      const withEmpty = applyPredicates(primary, [
        rangePredicate('YearMonth', '2024-01', '2024-02'),
        categoricalPredicate('Company', []),
      ]);
      const without = applyPredicates(primary, [rangePredicate('YearMonth', '2024-01', '2024-02')]);
      expect(withEmpty).toEqual(without);
    });

    it('skips a predicate on an absent column', () => {
      const result = applyPredicates(primary, [categoricalPredicate('shipping_country', ['UK'])]);
      expect(result.rows).toHaveLength(primary.rows.length);
    });

    it('returns an empty table when nothing matches', () => {
      const result = applyPredicates(primary, [categoricalPredicate('Company', ['Nobody'])]);
      expect(result.rows).toEqual([]);
      expect(result.columns).toEqual(primary.columns);
    });
  });

  it('yields the same rows for every predicate order', () => {
    const predicates: Predicate[] = [
      rangePredicate('YearMonth', '2024-01', '2024-02'),
      categoricalPredicate('shop', ['Amazon', 'eBay']),
      categoricalPredicate('Brands', ['Alpha']),
      categoricalPredicate('has_coupon', [false]),
    ];
    const expected = orders(applyPredicates(primary, predicates));
    expect(expected).toEqual([7]);

    for (const order of permutations(predicates)) {
      expect(orders(applyPredicates(primary, order))).toEqual(expected);
    }
  });

  it('does not mutate the input table', () => {
    const before = primary.rows.length;
    applyPredicates(primary, [categoricalPredicate('Company', ['Zenith'])]);
    expect(primary.rows).toHaveLength(before);
  });

  describe('filter specification', () => {
    it('maps the coupon flag to a single-value selection', () => {
      const { categoricals } = buildPredicates(spec({ hasCoupon: true }));
      expect(categoricals.find((p) => p.column === 'has_coupon')?.values).toEqual([true]);
    });

    it('maps "all" to a pass-through selection', () => {
      const { categoricals } = buildPredicates(spec());
      expect(categoricals.find((p) => p.column === 'has_coupon')?.values).toEqual([]);
    });

    it('filters the primary table by range and selections together', () => {
      const result = filterPrimary(primary, spec({ yearMonth: { from: '2024-02', to: '2024-03' }, shop: ['Amazon'] }));
      expect(orders(result)).toEqual([7, 2]);
    });

    it('filters on has_coupon = false', () => {
      const result = filterPrimary(primary, spec({ hasCoupon: false }));
      expect(orders(result)).toEqual([5, 7]);
    });
  });

  describe('numeric-looking dimensions', () => {
    const loaded = preparePrimaryTable(
      parseCsv('YearMonth,shop,has_coupon,orders\n2024-01,101,1,10\n2024-02,202,0,5\n2024-02,101,0,3\n'),
    );

    it('offers the values as strings that select their rows', () => {
      const options = filterOptions(loaded);
      expect(options.shop).toEqual(['101', '202']);

      const all = filterPrimary(loaded, { ...defaultFilterSpec(loaded), shop: options.shop });
      expect(orders(all)).toEqual([10, 5, 3]);

      const one = filterPrimary(loaded, { ...defaultFilterSpec(loaded), shop: ['101'] });
      expect(orders(one)).toEqual([10, 3]);
    });

    it('filters a 0/1 coupon column by flag', () => {
      expect(orders(filterPrimary(loaded, { ...defaultFilterSpec(loaded), hasCoupon: true }))).toEqual([10]);
      expect(orders(filterPrimary(loaded, { ...defaultFilterSpec(loaded), hasCoupon: false }))).toEqual([5, 3]);
    });
  });

  describe('options and defaults', () => {
    it('lists sorted distinct values per control', () => {
      const options = filterOptions(primary);
      expect(options.yearMonths).toEqual(['2024-01', '2024-02', '2024-03']);
      expect(options.company).toEqual(['Acme', 'Zenith']);
      expect(options.brands).toEqual(['Alpha', 'Beta', 'Gamma']);
      expect(options.shippingCountry).toEqual([]);
    });

    it('defaults to the full range and no selections', () => {
      expect(defaultFilterSpec(primary)).toEqual(spec());
    });

    it('fails when the time column is absent', () => {
      const noTime = tableOf([{ Company: 'Acme', orders: 1 }]);
      expect(() => filterOptions(noTime)).toThrow(FatalConfigurationError);
      expect(() => defaultFilterSpec(noTime)).toThrow(
        'Column `YearMonth` is missing or empty in monthly_aggregates.csv.',
      );
    });

    it('fails when the time column holds no values', () => {
      const empty = tableOf([{ YearMonth: null, orders: 1 }]);
      expect(() => filterOptions(empty)).toThrow(FatalConfigurationError);
    });
  });
});

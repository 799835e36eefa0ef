import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createView,
  FieldNotLoadedError,
  match,
  RecordView,
  SchemaAssignabilityError,
  type DataRecord,
} from '../src';
import { BAR, FOO, generateAccountArray, type AccountRecord } from './accounts.fixture';
import { Account, Contact, DATASET_SIZE } from './test-config';


describe('RecordView - construction', () => {
  it('copies the input sequence', () => {
    const records = [FOO, BAR];
    const view = RecordView.of(records);
    records.push(FOO);

    expect(view.size).toBe(2);
    expect(view.asList()).toEqual([FOO, BAR]);
  });


  it('accepts any iterable of records', () => {
    const view = RecordView.of(new Set([FOO, BAR]));

    expect(view.size).toBe(2);
    expect([...view]).toEqual([FOO, BAR]);
  });


  it('reports emptiness', () => {
    expect(RecordView.of<AccountRecord>([]).isEmpty()).toBe(true);
    expect(RecordView.of([FOO]).isEmpty()).toBe(false);
  });


  it('rejects records outside the declared schema', () => {
    const contact = Contact.create({ LastName: 'Lee' });

    expect(() => RecordView.of<DataRecord>([FOO, contact], Account)).toThrow(SchemaAssignabilityError);
    expect(() => RecordView.of<DataRecord>([FOO, contact], Account)).toThrow(
      'Record of schema Contact is not assignable to Account',
    );
  });
});


describe('RecordView - filtering', () => {
  const accounts = generateAccountArray(10);
  const view = RecordView.of(accounts, Account);


  it('keeps matching records in order', () => {
    const retail = view.filter(match.field('Industry').equals('Retail'));

    expect(retail.pluck('Name')).toEqual(['Account 2', 'Account 6']);
  });


  it('removes matching records and keeps the rest in order', () => {
    const rest = view.remove(match.field('Industry').equals('Retail'));

    expect(rest.size).toBe(8);
    expect(rest.pluck('Name')).toEqual([
      'Account 1',
      'Account 3',
      'Account 4',
      'Account 5',
      'Account 7',
      'Account 8',
      'Account 9',
      'Account 10',
    ]);
  });


  it('leaves the source view unchanged', () => {
    view.filter(match.field('Industry').equals('Retail'));
    view.remove(match.field('Industry').hasValue());

    expect(view.size).toBe(10);
    expect(view.asList()).toEqual(accounts);
  });


  it('finds the first matching record', () => {
    expect(view.find(match.field('Industry').equals('Mining'))).toBe(accounts[2]);
    expect(view.find(match.field('Industry').equals('Agriculture'))).toBeUndefined();
  });


  it('filters an empty view to an empty view', () => {
    const empty = RecordView.of<AccountRecord>([]);

    expect(empty.filter(match.field('Name').equals('Foo')).isEmpty()).toBe(true);
    expect(empty.find(match.field('Name').equals('Foo'))).toBeUndefined();
  });


  it('filters a full dataset', () => {
    const large = RecordView.of(generateAccountArray(DATASET_SIZE), Account);
    const active = large.filter(match.field('IsActive').equals(true));
    const inactive = large.filter(match.field('IsActive').equals(false));

    // Every third account is inactive
    expect(inactive.size).toBe(Math.ceil(DATASET_SIZE / 3));
    expect(active.size + inactive.size).toBe(DATASET_SIZE);
  });
});


describe('RecordView - transforms', () => {
  it('applies mapAll to every record', () => {
    const view = RecordView.of([FOO, BAR], Account);
    const zeroed = view.mapAll((record) => record.with({ AnnualRevenue: 0 }));

    expect(zeroed.pluck('AnnualRevenue')).toEqual([0, 0]);
    expect(view.pluck('AnnualRevenue')).toEqual([1000, 5000]);
  });


  it('applies mapSome to matching records only', () => {
    const view = RecordView.of([FOO, BAR], Account);
    const capped = view.mapSome(
      match.field('AnnualRevenue').greaterThan(2000),
      (record) => record.with({ AnnualRevenue: 2000 }),
    );

    expect(capped.size).toBe(2);
    expect(capped.pluck('AnnualRevenue')).toEqual([1000, 2000]);
    expect(capped.asList()[0]).toBe(FOO);
  });


  it('rejects transforms that leave the declared schema', () => {
    const view = createView([{ Name: 'Foo' }], { schema: 'Account' });
    const contact = Contact.create({ LastName: 'Lee' });

    expect(() => view.mapAll(() => contact)).toThrow(
      'Record of schema Contact is not assignable to Account',
    );
    expect(() => view.mapSome(match.field('Name').equals('Foo'), () => contact)).toThrow(
      SchemaAssignabilityError,
    );
    expect(view.mapSome(match.field('Name').equals('Bar'), () => contact).size).toBe(1);
  });
});


describe('RecordView - pick', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });


  it('copies records with only the picked fields populated', () => {
    const picked = RecordView.of([FOO, BAR], Account).pick(['Name']);
    const [first] = picked.asList();

    expect(picked.pluck('Name')).toEqual(['Foo', 'Bar']);
    expect(first.populatedFields()).toEqual(['Name']);
    expect(first).not.toBe(FOO);
    expect(() => picked.pluck('AnnualRevenue')).toThrow(FieldNotLoadedError);
    expect(FOO.isLoaded('AnnualRevenue')).toBe(true);
  });


  it('ignores repeated field names', () => {
    const picked = RecordView.of([FOO]).pick(['Name', 'Name', 'AnnualRevenue']);

    expect(picked.asList()[0].populatedFields()).toEqual(['Name', 'AnnualRevenue']);
  });


  it('throws for a field that is not loaded', () => {
    expect(() => RecordView.of([FOO]).pick(['Industry'])).toThrow(
      'Field "Industry" is not loaded on Account',
    );
  });


  it('rejects relation paths', () => {
    expect(() => RecordView.of([FOO]).pick(['Parent.Name'])).toThrow(
      'pick accepts direct fields only, got path "Parent.Name"',
    );
  });


  it('warns when no fields are picked', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const picked = RecordView.of([FOO]).pick([]);

    expect(warn).toHaveBeenCalledWith(
      'pick called with an empty field set. Picked records will have no populated fields.',
    );
    expect(picked.asList()[0].populatedFields()).toEqual([]);
  });
});


describe('RecordView - materialization', () => {
  it('returns a fresh array from asList', () => {
    const view = RecordView.of([FOO, BAR]);
    const list = view.asList();
    list.pop();

    expect(view.asList()).toEqual([FOO, BAR]);
  });


  it('narrows records to a schema', () => {
    const view = RecordView.of<DataRecord>([FOO, BAR]);
    const accounts: AccountRecord[] = view.asList(Account);

    expect(accounts).toEqual([FOO, BAR]);
  });


  it('throws when a record does not belong to the requested schema', () => {
    const view = RecordView.of<DataRecord>([FOO, Contact.create({ LastName: 'Lee' })]);

    expect(() => view.asList(Account)).toThrow(SchemaAssignabilityError);
    expect(() => view.asSet(Account)).toThrow('Record of schema Contact is not assignable to Account');
  });


  it('deduplicates records by identity in first-seen order', () => {
    const twin = Account.create({ Name: 'Foo', AnnualRevenue: 1000 });
    const set = RecordView.of([FOO, BAR, FOO, twin]).asSet();

    expect(set.size).toBe(3);
    expect([...set]).toEqual([FOO, BAR, twin]);
  });
});

import type { DataRecord } from '../src';
import { Account } from './test-config';

export type AccountRecord = DataRecord<'Account'>;

// Data pools for generation
// ==============================

const INDUSTRIES = ['Energy', 'Retail', 'Mining', 'Media'] as const;

const OWNERS = ['005-ALPHA', '005-BRAVO', '005-CHARLIE'] as const;

const REVENUE_STEPS = 50;

// Utils
// ==============================

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// Generator
// ==============================

/**
 * Generator function that yields Account records on-demand.
 * Output is deterministic: record `i` always gets the same values.
 *
 * - every fifth account has a null Industry
 * - every third account is inactive
 *
 * @param count - Number of accounts to generate
 * @param startId - Number used in the first account's name (default: 1)
 */
export function* generateAccounts(
  count: number,
  startId: number = 1,
): Generator<AccountRecord, void, unknown> {
  for (let index = 0; index < count; index++) {
    yield Account.create({
      Name: `Account ${startId + index}`,
      AnnualRevenue: ((index * 7919) % REVENUE_STEPS) * 1000,
      IsActive: index % 3 !== 0,
      CreatedDate: `2024-01-${pad(1 + (index % 28))}`,
      LastActivity: `2024-02-01T${pad(index % 24)}:00:00.000Z`,
      OwnerId: OWNERS[index % OWNERS.length],
      Industry: index % 5 === 4 ? null : INDUSTRIES[index % INDUSTRIES.length],
    });
  }
}

/**
 * Helper function to convert generator to array for smaller test cases.
 */
export function generateAccountArray(count: number, startId: number = 1): AccountRecord[] {
  return Array.from(generateAccounts(count, startId));
}

// Small fixed fixture
// ==============================

export const FOO = Account.create({ Name: 'Foo', AnnualRevenue: 1000 });
export const BAR = Account.create({ Name: 'Bar', AnnualRevenue: 5000 });

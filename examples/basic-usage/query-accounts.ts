import { createView, defineSchema, match } from '../../src';

const Account = defineSchema('Account', {
  Name: 'string',
  AnnualRevenue: 'number',
  Industry: 'string',
  CreatedDate: 'date',
  Parent: 'reference',
});

function main() {
  const holding = Account.create({ Name: 'Northwind Holding', Industry: 'Energy' });

  const accounts = createView(
    [
      { Name: 'Northwind Power', AnnualRevenue: 1200000, Industry: 'Energy', CreatedDate: '2024-01-04', Parent: holding },
      { Name: 'Contoso Retail', AnnualRevenue: 450000, Industry: 'Retail', CreatedDate: '2024-01-04', Parent: null },
      { Name: 'Fabrikam Mining', AnnualRevenue: 980000, Industry: 'Mining', CreatedDate: '2024-02-11', Parent: holding },
      { Name: 'Tailspin Media', AnnualRevenue: 75000, Industry: null, CreatedDate: '2024-03-20', Parent: null },
    ],
    Account,
  );

  // Example 1: Field conditions
  console.log('=== Example 1: Field Conditions ===');
  const large = accounts.filter(
    match.field('AnnualRevenue').greaterThan(500000).also('Industry').isIn(['Energy', 'Mining']),
  );
  console.log('Large energy or mining accounts:', large.pluck('Name'));
  console.log();

  // Example 2: Relation paths
  console.log('=== Example 2: Relation Paths ===');
  const underEnergy = match.field('Parent.Industry').equals('Energy');
  console.log('Accounts under an energy parent:', accounts.filter(underEnergy).pluck('Name'));
  console.log('Everything else:', accounts.remove(underEnergy).pluck('Name'));
  console.log();

  // Example 3: Prototype match
  console.log('=== Example 3: Prototype Match ===');
  const sameDay = accounts.filter(match.record(Account.create({ CreatedDate: '2024-01-04' })));
  console.log('Created on 2024-01-04:', sameDay.pluck('Name'));
  console.log();

  // Example 4: Grouping and projection
  console.log('=== Example 4: Grouping ===');
  for (const [industry, group] of accounts.groupBy('Industry')) {
    console.log(`${String(industry)}: ${group.length}`);
  }
  const slim = accounts.pick(['Name', 'AnnualRevenue']).asList(Account);
  console.log('Picked:', slim.map((record) => record.toObject()));
}

main();

import { createView, match } from '../../src';

// Rows as an API might return them, related rows nested
const rows = [
  { LastName: 'Lee', Email: 'lee@example.com', Score: 72, Account: { Name: 'Contoso', Industry: 'Retail' } },
  { LastName: 'Kim', Email: null, Score: 91, Account: { Name: 'Fabrikam', Industry: 'Mining' } },
  { LastName: 'Diaz', Email: 'diaz@example.com', Score: 55, Account: null },
];

function main() {
  const contacts = createView(rows, { schema: 'Contact' });

  for (const contact of contacts.asList().slice(0, 1)) {
    console.log('Inferred schema:', contact.schema.describe());
  }

  const reachable = contacts.filter(match.field('Email').hasValue().also('Score').greaterThanOrEquals(60));
  console.log('Reachable high scorers:', reachable.pluck('LastName'));

  console.log('Scores:', contacts.pluck('Score', 'number'));
  console.log('Account industries:', [...contacts.groupBy('Account.Industry').keys()]);
}

main();

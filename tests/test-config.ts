import { defineSchema } from '../src';

// Test Schemas
// ==============================

export const DATASET_SIZE = 2000;

export const Account = defineSchema('Account', {
  Name: 'string',
  AnnualRevenue: 'number',
  IsActive: 'boolean',
  CreatedDate: 'date',
  LastActivity: 'datetime',
  OwnerId: 'id',
  Industry: 'string',
  Parent: 'reference',
});

export const Contact = defineSchema('Contact', {
  LastName: 'string',
  Email: { type: 'string' },
  Account: { type: 'reference' },
});

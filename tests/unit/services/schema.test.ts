/**
 * Persistence adapter / migration consistency
 *
 * Every column the Supabase adapters select, filter, sort, write or map
 * must exist in the migration that creates the table.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

import { describe, it, expect } from 'vitest';

const MIGRATION = join(
  process.cwd(),
  'supabase/migrations/001_marketplace_core.sql'
);
const SERVICES_DIR = join(process.cwd(), 'src/services');

// Row interfaces and row mappers, by the table they describe
const ROW_TABLES: Record<string, string> = {
  OrderRow: 'orders',
  OrderItemRow: 'order_items',
  ProductRow: 'products',
  VendorRow: 'vendors',
  AddressRow: 'addresses',
  PlanRow: 'plans',
  SubscriptionRow: 'subscriptions',
  PaymentRow: 'subscription_payments',
  UsageRecordRow: 'usage_records',
  AuditLogRow: 'audit_logs',
  ProfileRow: 'profiles',
  VendorLinkRow: 'vendors',
};

const MAPPER_TABLES: Record<string, string> = {
  mapNewOrderToRow: 'orders',
  mapNewItemToRow: 'order_items',
  mapPatchToRow: 'orders',
  subscriptionPatchToRow: 'subscriptions',
  paymentPatchToRow: 'subscription_payments',
};

interface ColumnUse {
  file: string;
  table: string;
  column: string;
}

function parseTables(sql: string): Map<string, Set<string>> {
  const tables = new Map<string, Set<string>>();
  for (const match of sql.matchAll(
    /CREATE TABLE IF NOT EXISTS (\w+) \(([\s\S]*?)\n\);/g
  )) {
    const [, name = '', body = ''] = match;
    const columns = new Set<string>();
    for (const line of body.split('\n')) {
      const column = /^\s*([a-z][a-z0-9_]*)\s+[a-z]/.exec(line)?.[1];
      if (column !== undefined) {
        columns.add(column);
      }
    }
    tables.set(name, columns);
  }
  return tables;
}

function matchAllGroup(text: string, pattern: RegExp): string[] {
  return [...text.matchAll(pattern)].flatMap((match) =>
    match[1] === undefined ? [] : [match[1]]
  );
}

function collectColumnUses(file: string, source: string): ColumnUse[] {
  const uses: ColumnUse[] = [];
  const add = (table: string, columns: string[]): void => {
    for (const column of columns) {
      uses.push({ file, table, column });
    }
  };

  for (const [, name = '', body = ''] of source.matchAll(
    /interface (\w+) \{([\s\S]*?)\n\}/g
  )) {
    const table = ROW_TABLES[name];
    if (table !== undefined) {
      add(table, matchAllGroup(body, /^\s+([a-z][a-z0-9_]*)\??:/gm));
    }
  }

  for (const [, name = '', body = ''] of source.matchAll(
    /function (\w+)\([\s\S]*?\)[^{]*\{([\s\S]*?)\n\}/g
  )) {
    const table = MAPPER_TABLES[name];
    if (table !== undefined) {
      add(table, [
        ...matchAllGroup(body, /row\.([a-z][a-z0-9_]*) =/g),
        ...matchAllGroup(body, /^\s+([a-z][a-z0-9_]*):/gm),
      ]);
    }
  }

  for (const [, table = '', chain = ''] of source.matchAll(
    /\.from\('(\w+)'\)([\s\S]*?);/g
  )) {
    const selected = matchAllGroup(chain, /\.select\('([^']*)'\)/g)
      .filter((list) => list !== '*')
      .flatMap((list) => list.split(',').map((column) => column.trim()));
    const conflictKeys = matchAllGroup(chain, /onConflict: '([^']*)'/g).flatMap(
      (list) => list.split(',')
    );
    add(table, [
      ...selected,
      ...matchAllGroup(chain, /\.(?:eq|neq|in|is|order|gt|gte|lt|lte)\('(\w+)'/g),
      ...matchAllGroup(chain, /^\s*([a-z][a-z0-9_]*):/gm),
      ...conflictKeys,
    ]);
  }

  return uses;
}

describe('Supabase adapters against the migration', () => {
  const tables = parseTables(readFileSync(MIGRATION, 'utf-8'));
  const adapters = readdirSync(SERVICES_DIR).filter((file) =>
    file.endsWith('.db.ts')
  );
  const uses = adapters.flatMap((file) =>
    collectColumnUses(file, readFileSync(join(SERVICES_DIR, file), 'utf-8'))
  );

  it('should find the tables and the adapters', () => {
    expect(adapters.sort()).toEqual([
      'account.db.ts',
      'audit.db.ts',
      'order.db.ts',
      'subscription.db.ts',
    ]);
    expect(tables.get('order_items')?.has('position')).toBe(true);
    expect(uses.length).toBeGreaterThan(100);
  });

  it('should only touch columns the migration creates', () => {
    const missing = uses
      .filter((use) => tables.get(use.table)?.has(use.column) !== true)
      .map((use) => `${use.file}: ${use.table}.${use.column}`);

    expect(missing).toEqual([]);
  });

  it('should read order items back in submission order', () => {
    const source = readFileSync(join(SERVICES_DIR, 'order.db.ts'), 'utf-8');
    const itemChains = matchAllGroup(
      source,
      /\.from\('order_items'\)([\s\S]*?);/g
    );

    expect(itemChains).toHaveLength(1);
    expect(
      matchAllGroup(itemChains[0] ?? '', /\.order\('(\w+)'/g)
    ).toEqual(['position']);
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { SchemaHintProvider } from '../../src/server/catalog/schema-hints';
import { TtlCache } from '../../src/server/lib/ttl-cache';
import { testCatalog } from '../helpers/catalog';

const CATALOG_HINT = [
  'odoo_replica.stg_res_partner(id:bigint, display_name:text, vat:text, email:text, company_id:bigint)',
  'odoo_replica.stg_account_move(id:bigint, name:text, move_type:text, state:text, payment_state:text, ' +
    'partner_id:bigint, invoice_date:date, invoice_date_due:date, amount_total:numeric, ' +
    'amount_residual:numeric, currency_id:bigint, company_id:bigint)',
  'odoo_replica.stg_res_company(id:bigint, name)',
].join('\n');

function liveTypes() {
  return new Map([
    ['stg_res_company', new Map([['name', 'character varying'], ['created_at', 'timestamp']])],
  ]);
}

describe('SchemaHintProvider', () => {
  let t: number;
  const now = () => t;

  beforeEach(() => {
    t = 0;
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.mocked(console.warn).mockRestore();
  });

  it('should render catalog types when no introspection is configured', async () => {
    const hints = new SchemaHintProvider(testCatalog(), new TtlCache(1000, now));

    expect(await hints.get('odoo')).toBe(CATALOG_HINT);
  });

  it('should prefer live column types and list only catalogued columns', async () => {
    const introspect = vi.fn().mockResolvedValue(liveTypes());
    const hints = new SchemaHintProvider(testCatalog(), new TtlCache(1000, now), introspect);

    const hint = await hints.get('odoo');

    expect(introspect).toHaveBeenCalledWith('odoo_replica');
    expect(hint.split('\n')[2]).toBe('odoo_replica.stg_res_company(id:bigint, name:character varying)');
  });

  it('should serve cached hints until they expire', async () => {
    const introspect = vi.fn().mockResolvedValue(liveTypes());
    const hints = new SchemaHintProvider(testCatalog(), new TtlCache(1000, now), introspect);

    await hints.get('odoo');
    t = 999;
    await hints.get('odoo');
    expect(introspect).toHaveBeenCalledOnce();

    t = 1000;
    await hints.get('odoo');
    expect(introspect).toHaveBeenCalledTimes(2);
  });

  it('should fall back to catalog types without caching when introspection fails', async () => {
    const introspect = vi.fn().mockRejectedValueOnce(new Error('connection refused')).mockResolvedValue(liveTypes());
    const hints = new SchemaHintProvider(testCatalog(), new TtlCache(1000, now), introspect);

    expect(await hints.get('odoo')).toBe(CATALOG_HINT);
    expect(console.warn).toHaveBeenCalledWith(
      '[schema-hints] Introspection of odoo_replica failed, using catalog types:',
      'connection refused',
    );

    const retried = await hints.get('odoo');
    expect(introspect).toHaveBeenCalledTimes(2);
    expect(retried).toContain('name:character varying');
  });

  it('should return an empty hint for an unknown dataset', async () => {
    const introspect = vi.fn();
    const hints = new SchemaHintProvider(testCatalog(), new TtlCache(1000, now), introspect);

    expect(await hints.get('crm')).toBe('');
    expect(introspect).not.toHaveBeenCalled();
  });

  it('should re-introspect after invalidation', async () => {
    const introspect = vi.fn().mockResolvedValue(liveTypes());
    const hints = new SchemaHintProvider(testCatalog(), new TtlCache(1000, now), introspect);

    await hints.get('odoo');
    hints.invalidate('odoo');
    await hints.get('odoo');

    expect(introspect).toHaveBeenCalledTimes(2);
  });
});

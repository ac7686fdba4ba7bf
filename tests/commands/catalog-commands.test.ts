import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { dispatchLine } from '../../src/shell/repl.js';
import { RateLimitedError } from '../../src/services/errors.js';
import { FakeExecutor } from '../helpers/fakes.js';
import { createTestContext } from '../helpers/context.js';

const COMPANIES = '/api/platform/v1/company/companies';

function catalogExecutor(): FakeExecutor {
  return new FakeExecutor()
    .on('GET', COMPANIES, {
      companies: [
        { id: 'c1', name: 'Acme', friendlyName: 'Acme Corp' },
        { id: 'c2', name: 'Globex' },
      ],
    })
    .on('GET', `${COMPANIES}/c2/sites`, { sites: [{ id: 's1', name: 'HQ' }] })
    .on('GET', '/api/platform/v1/device/clients/c1/endpoints', {
      endpoints: [{ endpointId: 'e1', friendlyName: 'Laptop', endpointType: 'Desktop', osType: 'Windows' }],
    })
    .on('GET', '/api/platform/v1/automation/scripts', { scripts: [] });
}

describe('catalog commands', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('companies', () => {
    it('should print companies as JSON', async () => {
      const { ctx, output } = createTestContext({ executor: catalogExecutor() });

      await dispatchLine(ctx, 'companies -f json');

      expect(JSON.parse(output.lines[0])).toEqual({
        count: 2,
        companies: [
          { id: 'c1', name: 'Acme', friendlyName: 'Acme Corp' },
          { id: 'c2', name: 'Globex' },
        ],
      });
    });

    it('should print a titled table', async () => {
      const { ctx, output } = createTestContext({ executor: catalogExecutor() });

      await dispatchLine(ctx, 'companies');

      expect(output.lines).toHaveLength(1);
      expect(output.lines[0].split('\n')[0]).toBe('Companies');
      expect(output.lines[0]).toContain('Acme Corp');
      expect(output.lines[0]).toContain('Globex');
    });

    it('should print debug payloads when debugging', async () => {
      const { ctx, output } = createTestContext({ executor: catalogExecutor() });
      ctx.setDebug(true);

      await dispatchLine(ctx, 'companies');

      expect(output.errors[0]).toBe('DEBUG companies');
    });
  });

  describe('sites', () => {
    it('should resolve the company by list number', async () => {
      const { ctx, output } = createTestContext({ executor: catalogExecutor() });

      await dispatchLine(ctx, 'sites 2 --format json');

      expect(JSON.parse(output.lines[0])).toEqual({ companyId: 'c2', count: 1, sites: [{ id: 's1', name: 'HQ' }] });
    });
  });

  it('should wait out a rate-limited site list', async () => {
    const executor = catalogExecutor().on(
      'GET',
      `${COMPANIES}/c2/sites`,
      () => {
        throw new RateLimitedError(1);
      },
      { sites: [] }
    );
    const { ctx, output } = createTestContext({ executor });

    await dispatchLine(ctx, 'sites Globex');

    expect(output.errors).toEqual([]);
    expect(output.lines).toEqual([
      'API rate limit reached. Retrying in 1 seconds...',
      '1 seconds remaining...',
      'No sites found for company c2.',
    ]);
  });

  it('should wait out a rate-limited company list', async () => {
    const executor = catalogExecutor().on(
      'GET',
      COMPANIES,
      () => {
        throw new RateLimitedError(1);
      },
      { companies: [{ id: 'c1', name: 'Acme' }] }
    );
    const { ctx, output } = createTestContext({ executor });

    await dispatchLine(ctx, 'companies -f json');

    expect(output.errors).toEqual([]);
    expect(output.lines.slice(0, 2)).toEqual([
      'API rate limit reached. Retrying in 1 seconds...',
      '1 seconds remaining...',
    ]);
    expect(JSON.parse(output.lines[2])).toEqual({ count: 1, companies: [{ id: 'c1', name: 'Acme' }] });
  });

  describe('endpoints', () => {
    it('should accept multi-word company names', async () => {
      const { ctx, output } = createTestContext({ executor: catalogExecutor() });

      await dispatchLine(ctx, 'endpoints acme corp -f json');

      expect(JSON.parse(output.lines[0])).toEqual({
        companyId: 'c1',
        count: 1,
        endpoints: [{ endpointId: 'e1', friendlyName: 'Laptop', endpointType: 'Desktop', osType: 'Windows' }],
      });
    });

    it('should reject unknown companies', async () => {
      const { ctx, output } = createTestContext({ executor: catalogExecutor() });

      await dispatchLine(ctx, 'endpoints Initech');

      expect(output.errors).toEqual(["Error: Unknown company 'Initech'. Run 'companies' to see available options."]);
    });
  });

  it('should say when there are no scripts', async () => {
    const { ctx, output } = createTestContext({ executor: catalogExecutor() });

    await dispatchLine(ctx, 'scripts');

    expect(output.lines).toEqual(['No automation scripts returned.']);
  });

  it('should require configuration before requesting anything', async () => {
    const executor = catalogExecutor();
    const { ctx, output } = createTestContext({ executor, env: {} });

    await dispatchLine(ctx, 'companies');

    expect(output.errors).toEqual([
      'Error: Missing required configuration environment variables: ASIO_BASE_URL, ASIO_CLIENT_ID, ASIO_CLIENT_SECRET',
    ]);
    expect(executor.requests).toEqual([]);
  });
});

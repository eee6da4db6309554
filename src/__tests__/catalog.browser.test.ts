import { BrowseError } from '../errors/CustomError';
import {
  filterCatalog,
  formatCatalog,
  NodeCatalogBrowser,
} from '../services/NodeCatalogBrowser';
import { SessionManager } from '../services/SessionManager';
import { FakeClock } from './helpers/fakeClock';
import { FakeHandle, FakeProtocolClient, TEST_ENDPOINT } from './helpers/fakeProtocolClient';

const plantTree = () => ({
  'i=85': [
    { id: 'ns=1;s=Plant', displayName: 'Plant' },
    { id: 'ns=1;s=Diag', displayName: 'Diagnostics' },
  ],
  'ns=1;s=Plant': [{ id: 'ns=1;s=G1', displayName: 'Gauge1' }],
  'ns=1;s=G1': [
    { id: 'ns=1;s=G1_pressure', displayName: 'Pressure' },
    { id: 'ns=1;s=G1_status', displayName: 'Status' },
  ],
});

async function browseError(promise: Promise<unknown>): Promise<BrowseError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof BrowseError)) throw new Error(`expected a BrowseError, got ${String(err)}`);
  return err;
}

describe('NodeCatalogBrowser', () => {
  let client: FakeProtocolClient;
  let browser: NodeCatalogBrowser<FakeHandle>;

  beforeEach(() => {
    client = new FakeProtocolClient();
    client.tree = plantTree();
    const sessions = new SessionManager(client, TEST_ENDPOINT, {
      connectTimeoutMs: 1000,
      clock: new FakeClock(),
    });
    browser = new NodeCatalogBrowser(sessions, client);
  });

  it('lists the hierarchy depth-first with display-name paths', async () => {
    const { root, entries } = await browser.browse({ maxDepth: 8, stepTimeoutMs: 500 });

    expect(entries).toEqual([
      { id: 'ns=1;s=Plant', displayName: 'Plant', path: 'Plant', depth: 1 },
      { id: 'ns=1;s=G1', displayName: 'Gauge1', path: 'Plant/Gauge1', depth: 2 },
      {
        id: 'ns=1;s=G1_pressure',
        displayName: 'Pressure',
        path: 'Plant/Gauge1/Pressure',
        depth: 3,
      },
      { id: 'ns=1;s=G1_status', displayName: 'Status', path: 'Plant/Gauge1/Status', depth: 3 },
      { id: 'ns=1;s=Diag', displayName: 'Diagnostics', path: 'Diagnostics', depth: 1 },
    ]);
    expect(root.id).toBe('i=85');
    expect(root.children[0].children[0].children.map(c => c.displayName)).toEqual([
      'Pressure',
      'Status',
    ]);
    expect(client.browseCalls).toEqual([
      'i=85',
      'ns=1;s=Plant',
      'ns=1;s=G1',
      'ns=1;s=G1_pressure',
      'ns=1;s=G1_status',
      'ns=1;s=Diag',
    ]);
  });

  it('starts from an explicit root', async () => {
    const { entries } = await browser.browse({
      rootId: 'ns=1;s=G1',
      maxDepth: 8,
      stepTimeoutMs: 500,
    });
    expect(entries.map(e => e.path)).toEqual(['Pressure', 'Status']);
  });

  it('accepts a tree exactly as deep as the limit', async () => {
    const { entries } = await browser.browse({ maxDepth: 3, stepTimeoutMs: 500 });
    expect(entries).toHaveLength(5);
  });

  it('fails with the partial listing when the tree is deeper than the limit', async () => {
    const err = await browseError(browser.browse({ maxDepth: 2, stepTimeoutMs: 500 }));

    expect(err.kind).toBe('depthExceeded');
    expect(err.message).toBe('maximum browse depth 2 exceeded below ns=1;s=G1');
    expect(err.partial.map(e => e.path)).toEqual(['Plant', 'Plant/Gauge1']);
  });

  it('ends a reference cycle at the depth limit', async () => {
    client.tree = {
      'i=85': [{ id: 'ns=1;s=A', displayName: 'Loop' }],
      'ns=1;s=A': [{ id: 'ns=1;s=B', displayName: 'Back' }],
      'ns=1;s=B': [{ id: 'ns=1;s=A', displayName: 'Loop' }],
    };

    const err = await browseError(browser.browse({ maxDepth: 4, stepTimeoutMs: 500 }));

    expect(err.kind).toBe('depthExceeded');
    expect(err.message).toBe('maximum browse depth 4 exceeded below ns=1;s=B');
    expect(err.partial.map(e => e.path)).toEqual([
      'Loop',
      'Loop/Back',
      'Loop/Back/Loop',
      'Loop/Back/Loop/Back',
    ]);
  });

  it('keeps what was listed before a failing step', async () => {
    client.browseFailures = { 'ns=1;s=Diag': new Error('ECONNRESET') };

    const err = await browseError(browser.browse({ maxDepth: 8, stepTimeoutMs: 500 }));

    expect(err.kind).toBe('transient');
    expect(err.message).toBe('ECONNRESET');
    expect(err.partial).toHaveLength(5);
    expect(err.root?.children).toHaveLength(2);
  });

  it('keeps the kind of a classified failure', async () => {
    const fatal = new BrowseError('BadNodeIdUnknown', 'fatal');
    client.browseFailures = { 'ns=1;s=G1': fatal };

    const err = await browseError(browser.browse({ maxDepth: 8, stepTimeoutMs: 500 }));

    expect(err).toBe(fatal);
    expect(err.partial.map(e => e.id)).toEqual(['ns=1;s=Plant', 'ns=1;s=G1']);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const err = await browseError(
      browser.browse({ maxDepth: 8, stepTimeoutMs: 500, signal: controller.signal }),
    );

    expect(err.kind).toBe('fatal');
    expect(err.message).toBe('browse cancelled');
    expect(err.partial).toEqual([]);
    expect(client.browseCalls).toEqual([]);
  });
});

describe('catalog listing helpers', () => {
  const entries = [
    { id: 'ns=1;s=Plant', displayName: 'Plant', path: 'Plant', depth: 1 },
    { id: 'ns=1;s=G1', displayName: 'Gauge1', path: 'Plant/Gauge1', depth: 2 },
    { id: 'ns=1;s=G1_pressure', displayName: 'Pressure', path: 'Plant/Gauge1/Pressure', depth: 3 },
    { id: 'ns=1;s=Diag', displayName: 'Diagnostics', path: 'Diagnostics', depth: 1 },
  ];

  it('filters case-insensitively on id, name and path', () => {
    expect(filterCatalog(entries, 'GAUGE').map(e => e.id)).toEqual([
      'ns=1;s=G1',
      'ns=1;s=G1_pressure',
    ]);
    expect(filterCatalog(entries, 'g1_press').map(e => e.id)).toEqual(['ns=1;s=G1_pressure']);
    expect(filterCatalog(entries, '  ')).toHaveLength(4);
  });

  it('indents each line by depth', () => {
    expect(formatCatalog(entries)).toEqual([
      'Plant  [ns=1;s=Plant]  Plant',
      '  Gauge1  [ns=1;s=G1]  Plant/Gauge1',
      '    Pressure  [ns=1;s=G1_pressure]  Plant/Gauge1/Pressure',
      'Diagnostics  [ns=1;s=Diag]  Diagnostics',
    ]);
  });
});

import {
  BrowseError,
  ConnectError,
  describeError,
  ReadError,
} from '../errors/CustomError';
import type { CatalogEntry, CatalogNode, DataPointId } from '../types/telemetry';
import { withTimeout } from '../utils/timeout';
import type { ChildReference, ProtocolClient } from './ProtocolClient';
import type { SessionManager } from './SessionManager';

export interface BrowseOptions {
  /** defaults to the protocol client's root */
  rootId?: DataPointId;
  maxDepth: number;
  stepTimeoutMs: number;
  signal?: AbortSignal;
}

export interface BrowseResult {
  root: CatalogNode;
  entries: CatalogEntry[];
}

type MutableNode = {
  id: DataPointId;
  displayName: string;
  children: MutableNode[];
};

/**
 * Walks the server's hierarchy depth-first (pre-order, server reference order)
 * and flattens it into a listing an operator can search.
 *
 * There is no visited set: a cyclic hierarchy runs into the depth bound and
 * ends with a 'depthExceeded' BrowseError. Every failure carries the entries
 * collected so far in `partial`.
 */
export class NodeCatalogBrowser<H> {
  constructor(
    private readonly sessions: SessionManager<H>,
    private readonly client: ProtocolClient<H>,
  ) {}

  async browse(options: BrowseOptions): Promise<BrowseResult> {
    const { maxDepth, stepTimeoutMs, signal } = options;
    const rootId = options.rootId ?? this.client.rootId;
    const root: MutableNode = { id: rootId, displayName: rootId, children: [] };
    const entries: CatalogEntry[] = [];

    const visit = async (node: MutableNode, depth: number, trail: string[]) => {
      if (signal?.aborted) {
        throw new BrowseError('browse cancelled', 'fatal');
      }
      const children = await this.step(node.id, stepTimeoutMs);
      if (children.length > 0 && depth >= maxDepth) {
        throw new BrowseError(
          `maximum browse depth ${maxDepth} exceeded below ${node.id}`,
          'depthExceeded',
        );
      }
      for (const child of children) {
        const childNode: MutableNode = {
          id: child.id,
          displayName: child.displayName,
          children: [],
        };
        node.children.push(childNode);
        const childTrail = [...trail, child.displayName];
        entries.push({
          id: child.id,
          displayName: child.displayName,
          path: childTrail.join('/'),
          depth: depth + 1,
        });
        await visit(childNode, depth + 1, childTrail);
      }
    };

    try {
      await visit(root, 0, []);
    } catch (err) {
      const error =
        err instanceof BrowseError ? err : new BrowseError(describeError(err), kindOf(err));
      error.partial = [...entries];
      error.root = root;
      throw error;
    }
    return { root, entries };
  }

  private async step(id: DataPointId, timeoutMs: number): Promise<ChildReference[]> {
    return this.sessions.borrow(handle =>
      withTimeout(
        this.client.browseChildren(handle, id),
        timeoutMs,
        () => new BrowseError(`timeout browsing ${id}`, 'transient'),
      ),
    );
  }
}

const kindOf = (err: unknown): 'transient' | 'fatal' =>
  (err instanceof ConnectError || err instanceof ReadError) && err.kind === 'fatal'
    ? 'fatal'
    : 'transient';

/** Case-insensitive match on id, display name or path. */
export function filterCatalog(entries: readonly CatalogEntry[], term: string): CatalogEntry[] {
  const needle = term.trim().toLowerCase();
  if (!needle) return [...entries];
  return entries.filter(
    e =>
      e.id.toLowerCase().includes(needle) ||
      e.displayName.toLowerCase().includes(needle) ||
      e.path.toLowerCase().includes(needle),
  );
}

/** One line per entry, indented by depth: `<displayName>  [<id>]  <path>`. */
export function formatCatalog(entries: readonly CatalogEntry[]): string[] {
  return entries.map(
    e => `${'  '.repeat(Math.max(0, e.depth - 1))}${e.displayName}  [${e.id}]  ${e.path}`,
  );
}

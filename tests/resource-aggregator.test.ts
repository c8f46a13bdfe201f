import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { aggregateResources, type ResourceDescriptor } from '../src/mcp-client/index.js';

const resources: ResourceDescriptor[] = [
  { uri: 'memo://a', name: 'first' },
  { uri: 'memo://broken', name: 'broken' },
  { uri: 'memo://c', name: 'third' },
];

const contents: Record<string, string> = {
  'memo://a': 'alpha',
  'memo://c': 'gamma',
};

async function fetchContent(uri: string): Promise<string> {
  const content = contents[uri];
  if (content === undefined) {
    throw new Error('not readable');
  }
  return content;
}

describe('aggregateResources', () => {
  let consoleError: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  it('returns an empty string for no resources', async () => {
    expect(await aggregateResources([], fetchContent)).toBe('');
  });

  it('labels each block and keeps server order', async () => {
    const text = await aggregateResources([resources[0], resources[2]], fetchContent);

    expect(text).toBe('\nfirst:\nalpha\n\nthird:\ngamma\n');
  });

  it('omits a failed resource and logs its uri', async () => {
    const text = await aggregateResources(resources, fetchContent);

    expect(text).toBe('\nfirst:\nalpha\n\nthird:\ngamma\n');
    expect(consoleError).toHaveBeenCalledWith(
      '[ResourceAggregator] Warning: could not read resource memo://broken: not readable'
    );
  });

  it('reports failures to onFailure', async () => {
    const onFailure = vi.fn();

    await aggregateResources(resources, fetchContent, { onFailure });

    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure.mock.calls[0][0]).toEqual({ uri: 'memo://broken', name: 'broken' });
  });

  it('returns an empty string when every fetch fails', async () => {
    const failing = async (): Promise<string> => {
      throw new Error('down');
    };

    expect(await aggregateResources(resources, failing)).toBe('');
    expect(consoleError).toHaveBeenCalledTimes(3);
  });

  it('fetches sequentially', async () => {
    const order: string[] = [];
    const tracking = async (uri: string): Promise<string> => {
      order.push(`start ${uri}`);
      await new Promise(resolve => setTimeout(resolve, 1));
      order.push(`end ${uri}`);
      return uri;
    };

    await aggregateResources([resources[0], resources[2]], tracking);

    expect(order).toEqual(['start memo://a', 'end memo://a', 'start memo://c', 'end memo://c']);
  });
});

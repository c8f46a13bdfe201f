/**
 * Resource Aggregator
 *
 * Reads every advertised resource and joins the contents into one labeled
 * context block. A resource that cannot be read is left out.
 */

import { errorMessage } from '../errors.js';
import type { ResourceDescriptor } from './types.js';

export type ResourceFetcher = (uri: string) => Promise<string>;

export interface AggregateOptions {
  /** Called for each resource that could not be read */
  onFailure?: (resource: ResourceDescriptor, error: unknown) => void;
}

export async function aggregateResources(
  resources: ResourceDescriptor[],
  fetch: ResourceFetcher,
  options: AggregateOptions = {}
): Promise<string> {
  let text = '';

  // Sequential; block order follows server order.
  for (const resource of resources) {
    try {
      const content = await fetch(resource.uri);
      text += `\n${resource.name}:\n${content}\n`;
    } catch (err) {
      console.error(`[ResourceAggregator] Warning: could not read resource ${resource.uri}: ${errorMessage(err)}`);
      options.onFailure?.(resource, err);
    }
  }

  return text;
}

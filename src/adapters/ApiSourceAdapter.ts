/**
 * HTTP API source adapter.
 * One container per endpoint, named after the last path segment. The JSON
 * response is flattened into dotted field names; lists are described by
 * the objects they contain.
 */

import type { ExtractOptions, ISourceAdapter } from './ISourceAdapter.js';
import type { ApiSourceSpec, SourceSpec } from '../types/api.js';
import type { RawFieldDescriptor } from '../types/models.js';
import { inferJsonFields } from '../schema/infer.js';
import { looksLikePrimaryKey } from '../naming/heuristics.js';
import {
  SourceMalformedError,
  SourceUnreachableError,
  ValidationError,
  errorMessage,
} from '../errors.js';

const ROOT_CONTAINER = 'root';

export class ApiSourceAdapter implements ISourceAdapter {
  readonly kind = 'api';
  readonly sourceType = 'api';

  sourceId(spec: SourceSpec): string {
    const api = this.narrow(spec);
    return api.sourceId?.trim() || api.url;
  }

  async listContainers(spec: SourceSpec): Promise<string[]> {
    return [endpointName(this.narrow(spec).url)];
  }

  async extract(
    spec: SourceSpec,
    container: string,
    options: ExtractOptions
  ): Promise<RawFieldDescriptor[]> {
    const api = this.narrow(spec);

    let response: Response;
    try {
      response = await fetch(api.url, {
        method: api.method ?? 'GET',
        headers: { Accept: 'application/json', ...api.headers },
        signal: options.signal,
      });
    } catch (err) {
      throw new SourceUnreachableError(`Request to ${api.url} failed: ${errorMessage(err)}`, {
        url: api.url,
      });
    }

    if (!response.ok) {
      throw new SourceUnreachableError(`${api.url} answered HTTP ${response.status}`, {
        url: api.url,
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new SourceMalformedError(`Response from ${api.url} is not JSON: ${errorMessage(err)}`, {
        url: api.url,
      });
    }

    return inferJsonFields(body).map((field) => ({
      ...field,
      isPrimaryKey: looksLikePrimaryKey(field.name, container),
    }));
  }

  // ── Private ──

  private narrow(spec: SourceSpec): ApiSourceSpec {
    if (spec.kind !== 'api') {
      throw new ValidationError(`ApiSourceAdapter cannot crawl "${spec.kind}" sources`);
    }
    return spec;
  }
}

/** `https://host/api/v1/users?page=2` → `users`; a bare host → `root`. */
export function endpointName(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    throw new SourceMalformedError(`Invalid URL: ${url}`, { url });
  }
  const segments = pathname.split('/').filter((s) => s.length > 0);
  return segments.length > 0 ? segments[segments.length - 1] : ROOT_CONTAINER;
}

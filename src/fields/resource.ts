import { Resource } from '@opentelemetry/resources';
import type { Fields, ResolvedConfig } from '../types/index.js';
import { resourceFields } from './merge.js';

/**
 * SDK resource describing this process, shared by the three providers
 */
export function buildResource(config: ResolvedConfig, extra: Fields = {}): Resource {
  return new Resource({ ...resourceFields(config), ...extra });
}

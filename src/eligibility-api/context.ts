import type { BenefitRegistry } from '@core/benefits/registry';
import type { CatalogSnapshot } from '@core/catalog';
import type { MatchingPolicy } from '@core/policy';

/** Everything a request handler reads. Built once at startup, never mutated. */
export interface ApiContext {
  catalog: CatalogSnapshot;
  registry: BenefitRegistry;
  policy: MatchingPolicy;
}

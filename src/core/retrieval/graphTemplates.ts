import type { EntitySet, IntentLabel, SearchFilters } from './types';
import { splitLocation } from './entities';
import { normalizeKey } from './matcher';
import { hasStructuredFilters } from './strategy';

export type GraphTemplateKey =
  | 'property_detail'
  | 'property_agent'
  | 'agent_profile'
  | 'market_metrics_by_location'
  | 'properties_by_location'
  | 'market_text_search';

export type GraphParamValue = string | number | null | readonly string[];
export type GraphParams = Readonly<Record<string, GraphParamValue>>;

export interface GraphTemplate {
  readonly key: GraphTemplateKey;
  /**
   * Score given to the first row this template returns. Later rows decay as
   * `baseRelevance / (1 + 0.1 * position)`.
   */
  readonly baseRelevance: number;
  /** Every template returns `id`, `content` and `score` columns; the rest become metadata. */
  readonly cypher: string;
}

export interface GraphQueryPlan {
  readonly template: GraphTemplateKey;
  readonly params: GraphParams;
}

export const GRAPH_TEMPLATES: Readonly<Record<GraphTemplateKey, GraphTemplate>> = {
  property_detail: {
    key: 'property_detail',
    baseRelevance: 1.0,
    cypher: `
      MATCH (p:Property)
      WHERE p.property_id = $propertyId OR toLower(p.address) STARTS WITH toLower($propertyId)
      OPTIONAL MATCH (p)-[:LOCATED_IN]->(l:Location)
      RETURN p.property_id AS id,
             coalesce(p.content, p.address) AS content,
             'property_detail' AS result_type,
             p.address AS address,
             p.price AS price,
             p.property_type AS property_type,
             l.city AS city,
             l.state AS state,
             1.0 AS score
      LIMIT $limit`,
  },
  property_agent: {
    key: 'property_agent',
    baseRelevance: 1.0,
    cypher: `
      MATCH (p:Property)-[:LISTED_BY]->(a:Agent)
      WHERE p.property_id = $propertyId OR toLower(p.address) STARTS WITH toLower($propertyId)
      OPTIONAL MATCH (a)-[:WORKS_FOR]->(o:Office)
      RETURN a.agent_id AS id,
             coalesce(a.content, a.name + ' is the listing agent for ' + p.address) AS content,
             'listing_agent' AS result_type,
             a.name AS agent_name,
             a.phone AS agent_phone,
             a.email AS agent_email,
             o.name AS office,
             p.address AS address,
             1.0 AS score
      LIMIT $limit`,
  },
  agent_profile: {
    key: 'agent_profile',
    baseRelevance: 0.9,
    cypher: `
      MATCH (a:Agent)
      WHERE toLower(a.name) CONTAINS toLower($agentName)
      OPTIONAL MATCH (a)<-[:LISTED_BY]-(p:Property)
      WITH a, count(p) AS listings
      RETURN a.agent_id AS id,
             coalesce(a.content, a.name) AS content,
             'agent' AS result_type,
             a.name AS agent_name,
             a.phone AS agent_phone,
             a.email AS agent_email,
             listings AS listing_count,
             toFloat(listings) AS score
      ORDER BY listings DESC
      LIMIT $limit`,
  },
  market_metrics_by_location: {
    key: 'market_metrics_by_location',
    baseRelevance: 0.95,
    cypher: `
      MATCH (r:Region)-[:HAS_MARKET_DATA]->(md:MarketData)
      WHERE toLower(r.city) = toLower($city) AND ($state IS NULL OR r.state = $state)
      RETURN md.market_data_id AS id,
             md.content AS content,
             'market_metrics' AS result_type,
             r.name AS region,
             md.median_price AS median_price,
             md.inventory_count AS inventory_count,
             md.days_on_market AS days_on_market,
             md.months_supply AS months_supply,
             toString(md.date) AS date,
             1.0 AS score
      ORDER BY md.date DESC
      LIMIT $limit`,
  },
  properties_by_location: {
    key: 'properties_by_location',
    baseRelevance: 0.8,
    cypher: `
      MATCH (p:Property)-[:LOCATED_IN]->(l:Location)
      WHERE toLower(l.city) = toLower($city) AND ($state IS NULL OR l.state = $state)
        AND ($propertyType IS NULL OR toLower(p.property_type) = toLower($propertyType))
        AND ($minPrice IS NULL OR p.price >= $minPrice)
        AND ($maxPrice IS NULL OR p.price <= $maxPrice)
      OPTIONAL MATCH (p)-[:LISTED_BY]->(a:Agent)
      RETURN p.property_id AS id,
             coalesce(p.content, p.address) AS content,
             'property' AS result_type,
             p.address AS address,
             p.price AS price,
             p.property_type AS property_type,
             a.name AS agent_name,
             0.8 AS score
      ORDER BY p.price DESC
      LIMIT $limit`,
  },
  market_text_search: {
    key: 'market_text_search',
    baseRelevance: 0.6,
    cypher: `
      MATCH (md:MarketData)
      WITH md, size([t IN $terms WHERE toLower(md.content) CONTAINS t]) AS hits
      WHERE hits > 0
      RETURN md.market_data_id AS id,
             md.content AS content,
             'market_metrics' AS result_type,
             md.region_id AS region,
             toFloat(hits) / size($terms) AS score
      ORDER BY score DESC, md.date DESC
      LIMIT $limit`,
  },
};

const TEXT_SEARCH_STOPWORDS = new Set([
  'about', 'again', 'also', 'area', 'been', 'best', 'could', 'does', 'from', 'give', 'have', 'into',
  'like', 'look', 'looking', 'market', 'more', 'much', 'need', 'over', 'real', 'estate', 'should',
  'show', 'some', 'tell', 'than', 'that', 'their', 'there', 'these', 'they', 'this', 'what', 'when',
  'where', 'which', 'will', 'with', 'would', 'your',
]);

export function textSearchTerms(query: string, max = 6): string[] {
  const tokens = normalizeKey(query).split(/[^a-z0-9]+/);
  const out: string[] = [];
  for (const token of tokens) {
    if (token.length < 4 || TEXT_SEARCH_STOPWORDS.has(token) || out.includes(token)) continue;
    out.push(token);
    if (out.length >= max) break;
  }
  return out;
}

function filterParams(filters: SearchFilters | undefined): GraphParams {
  return {
    propertyType: filters?.propertyType ?? null,
    minPrice: filters?.minPrice ?? null,
    maxPrice: filters?.maxPrice ?? null,
  };
}

/**
 * Plans the template calls for one query. Extracted entity values are bound
 * as parameters, never spliced into Cypher. Plans keep entity order and are
 * unique by template + parameters.
 */
export function planGraphQueries(
  query: string,
  intent: IntentLabel,
  entities: EntitySet,
  filters: SearchFilters | undefined,
  limit: number
): GraphQueryPlan[] {
  const plans: GraphQueryPlan[] = [];
  const seen = new Set<string>();
  const add = (template: GraphTemplateKey, params: Record<string, GraphParamValue>) => {
    const bound: GraphParams = { ...params, limit };
    const key = `${template}:${JSON.stringify(bound)}`;
    if (seen.has(key)) return;
    seen.add(key);
    plans.push({ template, params: bound });
  };

  const hasFilters = hasStructuredFilters(filters);

  for (const propertyId of entities.propertyId) {
    add(intent === 'relationship_query' ? 'property_agent' : 'property_detail', { propertyId });
  }
  for (const agentName of entities.agent) {
    add('agent_profile', { agentName });
  }
  for (const location of entities.location) {
    const { city, state } = splitLocation(location);
    add('market_metrics_by_location', { city, state });
    if (intent === 'investment_analysis' || intent === 'comparative_analysis' || hasFilters) {
      add('properties_by_location', { city, state, ...filterParams(filters) });
    }
  }

  if (plans.length === 0) {
    const terms = textSearchTerms(query);
    if (terms.length > 0) add('market_text_search', { terms });
  }
  return plans;
}

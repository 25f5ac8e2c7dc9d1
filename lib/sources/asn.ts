import { z } from 'zod';
import { SourceContext, SourceDefinition, SourceFields } from './fetchSource';
import { ParseError, SourceError, toSourceError } from '../errors';
import { contactInfo, Ipv6Status, KnownOrganization, knownOrganization, organizationNameFor } from '../organizations';
import logger from '../logger';

export const RIPESTAT_WHOIS_URL = 'https://stat.ripe.net/data/whois/data.json';
export const BGPVIEW_ASN_URL = 'https://bgpview.io/api/asn';

export type QueryType = 'ASN' | 'ISP Name';
export type { Ipv6Status };

export const KNOWN_ORGANIZATION_SOURCE = 'IPv6 Organization Database';

const RECOMMENDATIONS: Record<Ipv6Status, string> = {
  'Full Support': 'Consider expanding IPv6 deployment to all services',
  'Partial Support': 'IPv6 implementation needed for complete dual-stack support',
  'No Support': 'IPv6 deployment required for modern internet standards',
  Unknown: 'Contact organization to verify IPv6 support status',
};

const ripeWhoisSchema = z.object({
  status: z.string(),
  data: z.object({
    records: z.array(z.array(z.object({ key: z.string(), value: z.string() }))).default([]),
  }),
});

const bgpViewPrefix = z.object({ prefix: z.string() });

const bgpViewSchema = z.object({
  status: z.string(),
  data: z.object({
    asn: z.number().optional(),
    name: z.string().nullish(),
    country_code: z.string().nullish(),
    ipv6_prefixes: z.array(bgpViewPrefix).default([]),
    ipv4_prefixes: z.array(bgpViewPrefix).default([]),
  }),
});

export interface WhoisSummary {
  registry: string;
  orgName?: string;
  country?: string;
  adminContact?: string;
  asn?: string;
  ipv6Allocations: string[];
  ipv4Allocations: string[];
}

export function classifyQuery(query: string): { type: QueryType; target: string } {
  const m = /^AS(\d+)$/i.exec(query.trim());
  if (m && m[1] !== undefined) return { type: 'ASN', target: m[1] };
  return { type: 'ISP Name', target: query.trim() };
}

export function ipv6Status(whois: WhoisSummary): Ipv6Status {
  if (whois.ipv6Allocations.length > 0) return 'Full Support';
  if (whois.asn) return 'Partial Support';
  return 'Unknown';
}

export function recommendationFor(status: Ipv6Status): string {
  return RECOMMENDATIONS[status];
}

const UNKNOWN_SERVICES = { web_hosting: 'Unknown', email: 'Unknown', dns: 'Unknown', content_delivery: 'Unknown' };

/** Service-level IPv6 support implied by an organization's status. */
export function servicesFor(status: Ipv6Status): Record<string, string> {
  if (status === 'Unknown') return { ...UNKNOWN_SERVICES };
  const full = status === 'Full Support';
  return {
    web_hosting: full ? 'IPv6 Supported' : 'IPv4 Only',
    email: full ? 'Dual Stack' : 'IPv4 Only',
    dns: 'Dual Stack',
    content_delivery: full ? 'IPv6 Supported' : 'IPv4 Only',
  };
}

function knownRecord(query: string, asn: string, org: KnownOrganization): SourceFields {
  return {
    query,
    query_type: 'ASN',
    asn_number: asn,
    organization_name: org.name,
    ipv6_status: org.ipv6_status,
    ipv6_allocations: org.ipv6_prefixes,
    ipv4_allocations: [],
    country: org.country,
    registry: org.registry,
    services: servicesFor(org.ipv6_status),
    contact_info: contactInfo(org.name),
    recommendation: recommendationFor(org.ipv6_status),
    source: KNOWN_ORGANIZATION_SOURCE,
  };
}

/** Query-specific fields layered over the registry fallback when every lookup fails. */
export function asnFallbackFields(query: string): SourceFields {
  const { type, target } = classifyQuery(query);
  const asn = type === 'ASN' ? target : undefined;
  return {
    query,
    query_type: type,
    asn_number: asn ?? null,
    organization_name: organizationNameFor(query, asn),
  };
}

/** Flatten RIPEstat whois records; later keys win for single-valued fields. */
export function parseRipeWhois(body: unknown): WhoisSummary {
  const parsed = ripeWhoisSchema.safeParse(body);
  if (!parsed.success) throw new ParseError(`unexpected RIPEstat payload: ${parsed.error.message}`, 'asn');
  if (parsed.data.status !== 'ok') throw new ParseError(`RIPEstat status ${parsed.data.status}`, 'asn');

  const summary: WhoisSummary = { registry: 'RIPE NCC API', ipv6Allocations: [], ipv4Allocations: [] };
  for (const group of parsed.data.data.records) {
    for (const { key, value } of group) {
      switch (key.toLowerCase()) {
        case 'orgname':
        case 'org-name':
        case 'descr':
          summary.orgName = value;
          break;
        case 'country':
          summary.country = value;
          break;
        case 'admin-c':
        case 'tech-c':
          summary.adminContact = value;
          break;
        case 'inet6num':
        case 'route6':
          summary.ipv6Allocations.push(value);
          break;
        case 'inetnum':
        case 'route':
          summary.ipv4Allocations.push(value);
          break;
        case 'origin':
          summary.asn = value;
          break;
      }
    }
  }
  return summary;
}

export function parseBgpView(body: unknown): WhoisSummary {
  const parsed = bgpViewSchema.safeParse(body);
  if (!parsed.success) throw new ParseError(`unexpected BGPView payload: ${parsed.error.message}`, 'asn');
  if (parsed.data.status !== 'ok') throw new ParseError(`BGPView status ${parsed.data.status}`, 'asn');
  const d = parsed.data.data;
  return {
    registry: 'BGPView API',
    orgName: d.name ?? (d.asn !== undefined ? `AS${d.asn} Organization` : undefined),
    country: d.country_code ?? undefined,
    asn: d.asn !== undefined ? String(d.asn) : undefined,
    ipv6Allocations: d.ipv6_prefixes.slice(0, 5).map((p) => p.prefix),
    ipv4Allocations: d.ipv4_prefixes.slice(0, 3).map((p) => p.prefix),
  };
}

async function lookupWhois(ctx: SourceContext, type: QueryType, target: string): Promise<WhoisSummary> {
  let lastError: SourceError = new ParseError('RIPEstat returned no organization', 'asn');
  try {
    const body = await ctx.http.getJson(`${RIPESTAT_WHOIS_URL}?resource=${encodeURIComponent(target)}`);
    const whois = parseRipeWhois(body);
    if (whois.orgName) return whois;
  } catch (e) {
    lastError = toSourceError(e, 'asn');
    logger.debug({ err: lastError, target }, 'RIPEstat whois lookup failed');
  }

  if (type !== 'ASN') throw lastError;
  const body = await ctx.http.getJson(`${BGPVIEW_ASN_URL}/${encodeURIComponent(target)}`, { timeoutMs: 10000 });
  return parseBgpView(body);
}

/**
 * IPv6 support of an AS number ("AS15169") or organization name. Known
 * organizations are answered from the local table without a lookup.
 */
export function asnSource(query: string): SourceDefinition {
  return {
    name: 'asn',
    async load(ctx): Promise<SourceFields> {
      const { type, target } = classifyQuery(query);
      const asn = type === 'ASN' ? target : undefined;
      const known = asn === undefined ? undefined : knownOrganization(asn);
      if (asn !== undefined && known) return knownRecord(query, asn, known);

      const whois = await lookupWhois(ctx, type, target);
      const status = ipv6Status(whois);
      const organization = whois.orgName ?? organizationNameFor(query, asn);
      return {
        query,
        query_type: type,
        asn_number: whois.asn ?? asn ?? null,
        organization_name: organization,
        ipv6_status: status,
        ipv6_allocations: whois.ipv6Allocations,
        ipv4_allocations: whois.ipv4Allocations,
        country: whois.country ?? 'Unknown',
        registry: whois.registry,
        admin_contact: whois.adminContact ?? null,
        services: { ...UNKNOWN_SERVICES },
        contact_info: contactInfo(organization),
        recommendation: recommendationFor(status),
        source: `RIR WHOIS Query (${whois.registry})`,
      };
    },
  };
}

export default asnSource;

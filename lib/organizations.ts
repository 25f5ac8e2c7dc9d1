import { z } from 'zod';
import organizationsJson from '../data/organizations.json';

export const ipv6StatusSchema = z.enum(['Full Support', 'Partial Support', 'No Support', 'Unknown']);
export type Ipv6Status = z.infer<typeof ipv6StatusSchema>;

const knownOrganizationSchema = z.object({
  name: z.string().min(1),
  ipv6_status: ipv6StatusSchema,
  country: z.string(),
  registry: z.string(),
  ipv6_prefixes: z.array(z.string()).default([]),
});

/**
 * - `known`: organizations whose IPv6 status is recorded, keyed by AS number
 * - `asn_names`: display names for AS numbers
 * - `name_aliases`: free-text query fragments mapped to a display name
 */
export const organizationsSchema = z.object({
  known: z.record(knownOrganizationSchema).default({}),
  asn_names: z.record(z.string()).default({}),
  name_aliases: z.array(z.object({ match: z.array(z.string().min(1)), name: z.string() })).default([]),
});

export type KnownOrganization = z.infer<typeof knownOrganizationSchema>;
export type Organizations = z.infer<typeof organizationsSchema>;

let organizations: Organizations | null = null;

export function getOrganizations(): Organizations {
  if (!organizations) organizations = organizationsSchema.parse(organizationsJson);
  return organizations;
}

export function knownOrganization(asn: string): KnownOrganization | undefined {
  return getOrganizations().known[asn];
}

function titleCase(s: string): string {
  return s.toLowerCase().replace(/[a-z]+/g, (w) => w.charAt(0).toUpperCase() + w.slice(1));
}

/**
 * Display name for an ASN or free-text query: the mapped name when there is
 * one, otherwise a title-cased query or "Organization for AS<n>".
 */
export function organizationNameFor(query: string, asn?: string): string {
  const { asn_names, name_aliases } = getOrganizations();
  if (asn) return asn_names[asn] ?? `Organization for AS${asn}`;

  const text = query.trim();
  if (!text) return 'Unknown Organization';
  const lower = text.toLowerCase();
  const alias = name_aliases.find((a) => a.match.some((m) => lower.includes(m)));
  if (alias) return alias.name;
  return titleCase(text) + (lower.includes('corp') ? '' : ' Corporation');
}

export type ContactInfo = { website: string; email: string; phone: string };

/** Guessed contact points from the first word of an organization name. */
export function contactInfo(organizationName: string): ContactInfo {
  const first = organizationName.trim().split(/\s+/)[0] ?? '';
  const slug = first.toLowerCase().replace(/\.com$/, '').replace(/[^a-z0-9-]/g, '');
  if (!slug) return { website: 'Unknown', email: 'Unknown', phone: 'Unknown' };
  return { website: `https://www.${slug}.com`, email: `noc@${slug}.com`, phone: 'Contact via website' };
}

export default getOrganizations;

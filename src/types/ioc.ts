/**
 * Types for indicator sets collected from platform results.
 */

export const IOC_KINDS = [
  'domains',
  'ips',
  'urls',
  'scanIds',
  'scanDates',
  'pageTitles',
  'serverDetails',
  'emails',
  'registrars',
  'nameservers',
  'organizations',
] as const;

export type IocKind = (typeof IOC_KINDS)[number];

/** Distinct values per indicator kind. */
export type IocSet = Record<IocKind, Set<string>>;

/** Serializable form; every kind is present, empty kinds as `[]`. */
export type SerializedIocs = Record<IocKind, string[]>;

/** Column name each kind is written under in the CSV exports. */
export const IOC_COLUMN_NAMES: Record<IocKind, string> = {
  domains: 'domain',
  ips: 'ip',
  urls: 'url',
  scanIds: 'scan_id',
  scanDates: 'scan_date',
  pageTitles: 'page_title',
  serverDetails: 'server',
  emails: 'email',
  registrars: 'registrar',
  nameservers: 'nameserver',
  organizations: 'organization',
};

/** File-name stem each kind is exported under, e.g. `scan_ids`. */
export const IOC_FILE_STEMS: Record<IocKind, string> = {
  domains: 'domains',
  ips: 'ips',
  urls: 'urls',
  scanIds: 'scan_ids',
  scanDates: 'scan_dates',
  pageTitles: 'page_titles',
  serverDetails: 'server_details',
  emails: 'emails',
  registrars: 'registrars',
  nameservers: 'nameservers',
  organizations: 'organizations',
};

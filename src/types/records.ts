/**
 * Types for platform records and their normalized, template-ready forms.
 */

/** An untyped record exactly as a platform returned it. */
export type RawRecord = Record<string, unknown>;

/** Every data type a report entry can carry. */
export type DataType =
  | 'whois'
  | 'webscan'
  | 'domain_search'
  | 'generic'
  | 'unknown'
  | 'message';

/** The subset the classifier can produce; `message` is synthetic. */
export type ClassifiedType = Exclude<DataType, 'message'>;

// --- Normalized variants ---

interface RecordBase {
  /** Name of the query that produced the record, set in group reports. */
  sourceQuery?: string;
}

export interface WhoisSummary {
  domain: string;
  registrar: string;
  created: string;
  updated: string;
  expires: string;
  name: string;
  email: string;
  organization: string;
  nameserver: string;
  address: string;
  city: string;
  state: string;
  country: string;
  zipcode: string;
  scanDate: string;
}

export interface WhoisRecord extends RecordBase {
  dataType: 'whois';
  fields: RawRecord;
  defangedDomain: string;
  /** Keyed `<field>_formatted`. */
  formatted: Record<string, string>;
  summary: WhoisSummary;
}

export interface SslSummary {
  issuer: string;
  expires: string;
  issued: string;
  sansCount: number;
  wildcard: boolean;
}

export interface GeoIpSummary {
  country: string;
  city: string;
  isp: string;
  asn: string;
  latitude: number;
  longitude: number;
}

export interface WebscanRecord extends RecordBase {
  dataType: 'webscan';
  fields: RawRecord;
  defangedDomain: string;
  defangedUrl: string;
  formatted: Record<string, string>;
  ssl?: SslSummary;
  geoip?: GeoIpSummary;
  rawRecord: RawRecord;
}

export interface DomainSearchRecord extends RecordBase {
  dataType: 'domain_search';
  fields: RawRecord;
}

export interface GenericRecord extends RecordBase {
  dataType: 'generic';
  rawData: unknown;
}

export interface MessageRecord extends RecordBase {
  dataType: 'message';
  message: string;
}

export type NormalizedRecord =
  | WhoisRecord
  | WebscanRecord
  | DomainSearchRecord
  | GenericRecord
  | MessageRecord;

/**
 * A web-scan search result. These arrive with a fixed `page`/`task` layout
 * and skip classification.
 */
export interface UrlscanResult extends RecordBase {
  dataType: 'urlscan_result';
  fields: RawRecord;
  defangedUrl: string;
  defangedDomain: string;
  scanId?: string;
  localScreenshot?: string;
}

/** Anything a report can list. */
export type ReportEntry = NormalizedRecord | UrlscanResult;

export type EntryType = ReportEntry['dataType'];

import { describe, it, expect } from 'vitest';
import { TemplateRegistry } from '@/normalization/template-registry.js';
import type { ReportEntry } from '@/types/records.js';

const whois: ReportEntry = {
  dataType: 'whois',
  fields: {},
  defangedDomain: '',
  formatted: {},
  summary: {
    domain: '', registrar: '', created: '', updated: '', expires: '', name: '', email: '',
    organization: '', nameserver: '', address: '', city: '', state: '', country: '',
    zipcode: '', scanDate: '',
  },
};
const urlscanResult: ReportEntry = { dataType: 'urlscan_result', fields: {}, defangedUrl: '', defangedDomain: '' };
const generic: ReportEntry = { dataType: 'generic', rawData: {} };

describe('TemplateRegistry', () => {
  it('maps data types to their templates', () => {
    const registry = new TemplateRegistry();
    expect(registry.templateFor(whois)).toBe('whois');
    expect(registry.templateFor(generic, 'silentpush')).toBe('generic');
    expect(registry.templateFor({ dataType: 'message', message: 'm' })).toBe('message');
  });

  it('falls back to the platform default for unmapped types', () => {
    expect(new TemplateRegistry().templateFor(urlscanResult)).toBe('urlscan-result');
  });

  it('uses platform defaults when no type mapping exists', () => {
    const registry = new TemplateRegistry(undefined, {});
    expect(registry.templateFor(generic, 'silentpush')).toBe('generic');
    expect(registry.templateFor(generic, 'urlscan')).toBe('urlscan-result');
    expect(registry.templateFor(generic)).toBe('urlscan-result');
  });

  it('accepts new registrations without touching other registries', () => {
    const registry = new TemplateRegistry();
    registry.registerTemplate('urlscan_result', 'custom-scan');
    expect(registry.templateFor(urlscanResult)).toBe('custom-scan');
    expect(new TemplateRegistry().templateFor(urlscanResult)).toBe('urlscan-result');
  });

  it('lists every distinct template name', () => {
    expect(new TemplateRegistry().templateNames()).toEqual([
      'whois',
      'webscan',
      'domain-search',
      'generic',
      'message',
      'urlscan-result',
    ]);
  });
});

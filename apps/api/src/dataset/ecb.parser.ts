import { XMLParser } from 'fast-xml-parser';
import { EUR, isCurrencyCode, isIsoDate } from '@exchangerates/shared';
import { Day, sortDays } from './dataset';

type XmlNode = Record<string, unknown>;

// gesmes:Envelope > Cube > Cube[@time] > Cube[@currency,@rate]
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseAttributeValue: false,
  removeNSPrefix: true,
  isArray: name => name === 'Cube',
});

function invalid(detail: string): Error {
  return new Error(`ECB_XML_INVALID: ${detail}`);
}

function isRecord(v: unknown): v is XmlNode {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function cubesOf(node: unknown): XmlNode[] {
  if (!isRecord(node) || !Array.isArray(node.Cube)) return [];
  return node.Cube.filter(isRecord);
}

export function parseEcbXml(xml: string): Day[] {
  let doc: unknown;
  try {
    doc = parser.parse(xml);
  } catch (e) {
    throw invalid(e instanceof Error ? e.message : String(e));
  }
  const envelope = isRecord(doc) ? doc.Envelope : undefined;
  if (!isRecord(envelope)) throw invalid('missing Envelope');

  const outer = envelope.Cube;
  if (!Array.isArray(outer) || !outer.length) throw invalid('missing outer Cube');

  const days: Day[] = [];
  for (const cube of cubesOf(outer[0])) {
    const date = cube['@_time'];
    if (!isIsoDate(date)) throw invalid(`bad date ${String(date)}`);

    const rates: Record<string, number> = {};
    for (const r of cubesOf(cube)) {
      const currency = r['@_currency'];
      const rate = Number(r['@_rate']);
      if (!isCurrencyCode(currency)) throw invalid(`bad currency ${String(currency)} on ${date}`);
      if (!Number.isFinite(rate) || rate <= 0) throw invalid(`bad rate for ${currency} on ${date}`);
      rates[currency] = rate;
    }
    rates[EUR] = 1;
    days.push({ date, rates });
  }

  return sortDays(days);
}

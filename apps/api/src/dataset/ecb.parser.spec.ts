import { parseEcbXml } from './ecb.parser';

const envelope = (cubes: string) => `<?xml version="1.0" encoding="UTF-8"?>
<gesmes:Envelope xmlns:gesmes="http://www.gesmes.org/xml/2002-08-01" xmlns="http://www.ecb.int/vocabulary/2002-08-01/eurofxref">
  <gesmes:subject>Reference rates</gesmes:subject>
  <gesmes:Sender><gesmes:name>European Central Bank</gesmes:name></gesmes:Sender>
  <Cube>${cubes}</Cube>
</gesmes:Envelope>`;

describe('parseEcbXml', () => {
  it('reads days oldest first and adds EUR', () => {
    const days = parseEcbXml(
      envelope(`
        <Cube time="2024-03-15">
          <Cube currency="USD" rate="1.0890"/>
          <Cube currency="JPY" rate="162.09"/>
        </Cube>
        <Cube time="2024-03-14">
          <Cube currency="USD" rate="1.0925"/>
        </Cube>`),
    );

    expect(days).toEqual([
      { date: '2024-03-14', rates: { USD: 1.0925, EUR: 1 } },
      { date: '2024-03-15', rates: { USD: 1.089, JPY: 162.09, EUR: 1 } },
    ]);
  });

  it('keeps a day with a single currency', () => {
    const days = parseEcbXml(envelope('<Cube time="2024-03-15"><Cube currency="GBP" rate="0.8545"/></Cube>'));
    expect(days).toEqual([{ date: '2024-03-15', rates: { GBP: 0.8545, EUR: 1 } }]);
  });

  it('returns no days for an empty outer cube', () => {
    expect(parseEcbXml(envelope(''))).toEqual([]);
  });

  it('rejects documents that are not ECB envelopes', () => {
    expect(() => parseEcbXml('<html><body>maintenance</body></html>')).toThrow('ECB_XML_INVALID: missing Envelope');
  });

  it('rejects malformed rates, currencies and dates', () => {
    expect(() =>
      parseEcbXml(envelope('<Cube time="2024-03-15"><Cube currency="USD" rate="n/a"/></Cube>')),
    ).toThrow('ECB_XML_INVALID: bad rate for USD on 2024-03-15');
    expect(() =>
      parseEcbXml(envelope('<Cube time="2024-03-15"><Cube currency="usd" rate="1.1"/></Cube>')),
    ).toThrow('ECB_XML_INVALID: bad currency usd on 2024-03-15');
    expect(() =>
      parseEcbXml(envelope('<Cube time="15/03/2024"><Cube currency="USD" rate="1.1"/></Cube>')),
    ).toThrow('ECB_XML_INVALID: bad date 15/03/2024');
  });
});

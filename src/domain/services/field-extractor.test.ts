import { FieldExtractor, toPlainText } from './field-extractor.js';

describe('toPlainText', () => {
  it('drops tags, scripts and styles and decodes entities', () => {
    const html = '<style>td{}</style><p>6&nbsp;120&#160;kWh/m&sup2;</p><script>var x = 1;</script>';
    expect(toPlainText(html).trim()).toBe('6 120 kWh/m²');
  });

  it('keeps adjacent table cells on separate lines', () => {
    const html = '<table><tr><td>Result</td><td>5</td><td>400 kWh</td></tr></table>';
    expect(toPlainText(html).trim().split(/\n+/)).toEqual(['Result', '5', '400 kWh']);
  });
});

describe('FieldExtractor.extract', () => {
  it('reads "6,120 kWh/year" as 6120 kWh', () => {
    const metrics = FieldExtractor.extract('Estimated: 6,120 kWh/year');
    expect(metrics).toEqual({ valid: true, annualYieldKwh: 6120, matchedBy: 'label' });
  });

  it('reads the labelled yield from an estimator results table', () => {
    const html = `
      <table>
        <tr><td>Installed peak PV power [kWp]:</td><td>5</td></tr>
        <tr><td>System loss [%]:</td><td>14</td></tr>
        <tr><td>Yearly in-plane irradiation [kWh/m2]:</td><td>1890.5</td></tr>
        <tr><td>Yearly PV energy production [kWh]:</td><td>1696.92</td></tr>
      </table>`;
    const metrics = FieldExtractor.extract(html);
    expect(metrics).toEqual({
      valid: true,
      annualYieldKwh: 1696.92,
      matchedBy: 'label',
      peakPowerKw: 5,
      systemLossesPct: 14,
      irradiationKwhM2: 1890.5,
    });
  });

  it('falls back to any kWh value when no label matches', () => {
    const metrics = FieldExtractor.extract('Result: 5 400 kWh');
    expect(metrics).toEqual({ valid: true, annualYieldKwh: 5400, matchedBy: 'loose' });
  });

  it('ignores numbers without a kWh unit', () => {
    expect(FieldExtractor.extract('Error 404: page not found')).toEqual({
      valid: false,
      reason: 'no_numeric_match',
    });
  });

  it('does not take irradiation (kWh/m²) for a yield', () => {
    expect(FieldExtractor.extract('1890 kWh/m2')).toEqual({ valid: false, reason: 'no_numeric_match' });
  });

  it('reports no_numeric_match for a page without numbers', () => {
    expect(FieldExtractor.extract('The service is temporarily unavailable')).toEqual({
      valid: false,
      reason: 'no_numeric_match',
    });
  });

  it('reports out_of_range for a labelled yield above the ceiling', () => {
    expect(FieldExtractor.extract('Yearly PV energy production [kWh]: 250000')).toEqual({
      valid: false,
      reason: 'out_of_range',
    });
  });

  it('reports out_of_range when every kWh value is above the ceiling', () => {
    expect(FieldExtractor.extract('Grid total 2,500,000 kWh')).toEqual({ valid: false, reason: 'out_of_range' });
  });

  it('never throws and returns a frozen result', () => {
    const metrics = FieldExtractor.extract('');
    expect(metrics.valid).toBe(false);
    expect(Object.isFrozen(metrics)).toBe(true);
  });

  describe('entities', () => {
    it('decodes a numeric narrow no-break space inside a grouped yield', () => {
      const html = '<td>Yearly PV energy production [kWh]:</td><td>6&#8239;120</td>';
      expect(FieldExtractor.extract(html)).toEqual({ valid: true, annualYieldKwh: 6120, matchedBy: 'label' });
    });

    it('decodes hexadecimal and named thin spaces', () => {
      expect(FieldExtractor.extract('<p>6&#x202F;120 kWh/year</p>')).toEqual({
        valid: true,
        annualYieldKwh: 6120,
        matchedBy: 'label',
      });
      expect(FieldExtractor.extract('<p>6&thinsp;120 kWh/year</p>')).toEqual({
        valid: true,
        annualYieldKwh: 6120,
        matchedBy: 'label',
      });
      expect(FieldExtractor.extract('<p>Annual yield: 6&ensp;120 kWh</p>')).toEqual({
        valid: true,
        annualYieldKwh: 6120,
        matchedBy: 'label',
      });
    });
  });

  describe('decimal variants', () => {
    it('reads "6.120 kWh/year" as grouped thousands', () => {
      expect(FieldExtractor.extract('6.120 kWh/year')).toEqual({ valid: true, annualYieldKwh: 6120, matchedBy: 'label' });
    });

    it('keeps a lone dot as a decimal mark for an unlabelled kWh value', () => {
      expect(FieldExtractor.extract('Result: 6.120 kWh')).toEqual({ valid: true, annualYieldKwh: 6.12, matchedBy: 'loose' });
    });

    it('does not join numbers from adjacent cells', () => {
      const html = '<table><tr><td>Result</td><td>5</td><td>400 kWh</td></tr></table>';
      expect(FieldExtractor.extract(html)).toEqual({ valid: true, annualYieldKwh: 400, matchedBy: 'loose' });
    });
  });

  describe('pathological input', () => {
    it('scans a 100 KB digit run in well under a second', () => {
      const startedAt = Date.now();
      expect(FieldExtractor.extract(`${'1'.repeat(100_000)} kWh`)).toEqual({ valid: false, reason: 'no_numeric_match' });
      expect(FieldExtractor.extract('1.'.repeat(50_000))).toEqual({ valid: false, reason: 'no_numeric_match' });
      expect(Date.now() - startedAt).toBeLessThan(1000);
    });
  });
});

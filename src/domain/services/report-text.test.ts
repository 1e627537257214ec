import { completedReport, failedReport } from '@shared/testing/run-report-fixtures.js';
import { SOCIAL_POST_LIMIT, composeSocialPost, formatTextReport } from './report-text.js';

describe('formatTextReport', () => {
  it('lists yield, financials and rating for a completed run', () => {
    expect(formatTextReport(completedReport()).split('\n')).toEqual([
      'Solar profitability report: 123 Solar Ave',
      'Run: 11111111-1111-4111-8111-111111111111 (Completed)',
      'Annual yield: 6120 kWh',
      'Irradiation: 1890 kWh/m² per year',
      'System size: 5.00 kWp (extracted)',
      'Annual savings: 918.00',
      'Estimated system cost: 6000.00',
      'Payback: 6.5 years',
      'Lifetime savings (20 years): 12360.00',
      'CO2 avoided: 2448 kg per year',
      'Rating: excellent',
    ]);
  });

  it('marks missing figures and names the failing step', () => {
    expect(formatTextReport(failedReport()).split('\n').slice(2)).toEqual([
      'Annual yield: unavailable',
      'Financials: unavailable',
      'Failed at navigate: Timed out: navigate https://estimator.test/',
    ]);
  });

  it('gives the extraction reason when the page had no yield', () => {
    const report = completedReport({ metrics: { valid: false, reason: 'out_of_range' }, profitability: null });
    expect(formatTextReport(report)).toContain('Annual yield: unavailable (out_of_range)');
  });
});

describe('composeSocialPost', () => {
  it('summarizes the figures', () => {
    expect(composeSocialPost(completedReport())).toBe(
      'Solar check for 123 Solar Ave: 6120 kWh/year, saves 918/year, payback 6.5 years, ' +
        '2448 kg CO2 avoided yearly. Rating: excellent. #solar #renewables',
    );
  });

  it('says so when financials are missing', () => {
    expect(composeSocialPost(failedReport())).toBe(
      'Solar check for 123 Solar Ave: financials unavailable for this run. #solar',
    );
  });

  it('shortens a long address to fit the limit', () => {
    const address = 'Rooftop '.repeat(40).trim();
    const post = composeSocialPost(completedReport({ location: { kind: 'address', address } }));
    expect(post).toHaveLength(SOCIAL_POST_LIMIT);
    expect(post.startsWith('Solar check for Rooftop Rooftop')).toBe(true);
    expect(post).toContain('…: 6120 kWh/year');
    expect(post.endsWith('#solar #renewables')).toBe(true);
  });
});

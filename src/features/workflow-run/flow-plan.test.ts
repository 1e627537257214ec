import { buildFlowPlan } from './flow-plan.js';

const flow = { estimatorUrl: 'https://estimator.test/tools/', systemSizeKw: 5, systemLossPct: 14 };

describe('buildFlowPlan', () => {
  it('types the address into the form by label, then by selector', () => {
    const plan = buildFlowPlan({ kind: 'address', address: '123 Solar Ave' }, flow);

    expect(plan.navigate).toEqual([{ kind: 'navigate', target: 'https://estimator.test/tools/' }]);
    expect(plan.submit[0]).toEqual({
      kind: 'submit',
      target: 'Visualize results',
      payload: {
        fields: [
          { target: 'Address', value: '123 Solar Ave' },
          { target: 'Installed peak PV power [kWp]', value: '5' },
          { target: 'System loss [%]', value: '14' },
        ],
      },
    });
    expect(plan.submit[1]?.target).toBe('#btviewPV');
    expect(plan.submit[1]?.payload.fields.map((f) => f.target)).toEqual(['#inputAddress', '#peakpower', '#loss']);
  });

  it('opens coordinates through the query string first', () => {
    const plan = buildFlowPlan({ kind: 'coordinates', lat: 14.69, lon: -17.45 }, flow);
    expect(plan.navigate.map((r) => r.target)).toEqual([
      'https://estimator.test/tools/?lat=14.69&lon=-17.45',
      'https://estimator.test/tools/',
    ]);
    expect(plan.submit[0]?.payload.fields.slice(0, 2)).toEqual([
      { target: 'Lat', value: '14.69' },
      { target: 'Lon', value: '-17.45' },
    ]);
  });

  it('reads the results region before the whole page', () => {
    const plan = buildFlowPlan({ kind: 'address', address: '1 Main St' }, flow);
    expect(plan.extract.map((r) => r.target)).toEqual(['Simulation outputs', '']);
  });
});

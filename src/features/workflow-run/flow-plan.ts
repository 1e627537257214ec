import type { Location } from '@domain/types/location.js';
import type { FlowConfig } from '@domain/types/config.js';
import type {
  FormField,
  NavigateRequest,
  ReadRequest,
  SubmitRequest,
} from '@domain/types/action.js';

/**
 * The gateway requests for each spine step of the estimator flow.
 *
 * Every step lists its target strategies in order: the first is tried
 * until it succeeds or is rejected outright, then the next takes over.
 * Targets are written for an agent that resolves visible labels as well as
 * CSS selectors.
 */
export interface FlowPlan {
  navigate: readonly NavigateRequest[];
  submit: readonly SubmitRequest[];
  extract: readonly ReadRequest[];
}

const RESULTS_BUTTON_LABEL = 'Visualize results';
const RESULTS_REGION_LABEL = 'Simulation outputs';

function locationFields(location: Location, by: 'label' | 'css'): FormField[] {
  if (location.kind === 'address') {
    return [{ target: by === 'label' ? 'Address' : '#inputAddress', value: location.address }];
  }
  return [
    { target: by === 'label' ? 'Lat' : '#inputLat', value: String(location.lat) },
    { target: by === 'label' ? 'Lon' : '#inputLon', value: String(location.lon) },
  ];
}

function systemFields(flow: FlowConfig, by: 'label' | 'css'): FormField[] {
  return [
    {
      target: by === 'label' ? 'Installed peak PV power [kWp]' : '#peakpower',
      value: String(flow.systemSizeKw),
    },
    {
      target: by === 'label' ? 'System loss [%]' : '#loss',
      value: String(flow.systemLossPct),
    },
  ];
}

function estimatorUrl(location: Location, flow: FlowConfig): string {
  if (location.kind === 'address') return flow.estimatorUrl;
  const url = new URL(flow.estimatorUrl);
  url.searchParams.set('lat', String(location.lat));
  url.searchParams.set('lon', String(location.lon));
  return url.toString();
}

export function buildFlowPlan(location: Location, flow: FlowConfig): FlowPlan {
  const navigate: NavigateRequest[] = [{ kind: 'navigate', target: estimatorUrl(location, flow) }];
  if (location.kind === 'coordinates') {
    navigate.push({ kind: 'navigate', target: flow.estimatorUrl });
  }

  return {
    navigate,
    submit: [
      {
        kind: 'submit',
        target: RESULTS_BUTTON_LABEL,
        payload: { fields: [...locationFields(location, 'label'), ...systemFields(flow, 'label')] },
      },
      {
        kind: 'submit',
        target: '#btviewPV',
        payload: { fields: [...locationFields(location, 'css'), ...systemFields(flow, 'css')] },
      },
    ],
    extract: [
      { kind: 'read', target: RESULTS_REGION_LABEL, payload: { capture: 'text' } },
      { kind: 'read', target: '', payload: { capture: 'text' } },
    ],
  };
}

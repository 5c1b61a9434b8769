import { FlowDefinition } from '../types';
import { bookingFlow } from './booking.flow';

export const flows: FlowDefinition[] = [bookingFlow];

export function getFlow(name: string): FlowDefinition | undefined {
  return flows.find((flow) => flow.name === name);
}

import { FlowDefinition } from '../types';
import { currentClassesFlow } from './current-classes.flow';
import { loginFlow } from './login.flow';

export const flows: FlowDefinition[] = [loginFlow, currentClassesFlow];

export function getFlow(name: string): FlowDefinition | undefined {
  return flows.find((flow) => flow.name === name);
}

import type { Processor } from '@turnflow/core';

import { RegistrationFlow } from './demo-flow';

/** Runs the gateway's entry flow for one inbound request. */
export type FlowLauncher = <TRequest, TReply>(processor: Processor<TRequest, TReply>, request: TRequest) => Promise<TReply>;

export const launchRegistration: FlowLauncher = (processor, request) =>
  processor.run(RegistrationFlow, 'start', request);

export { RegistrationFlow } from './demo-flow';

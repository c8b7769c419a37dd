export * from './commit';
export * from './trigger-event';
export * from './gatekeeper';

export { AlertCooldownManager } from './cooldown-manager';
export type { AlertCooldownManagerConfig } from './cooldown-manager';
export { AlertDispatcher } from './alert-dispatcher';
export type { RaiseAlertInput } from './alert-dispatcher';

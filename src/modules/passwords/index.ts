export { executeVerifyPasswordFlow } from './flows/verify-password-flow';
export type { VerifyPasswordParams, VerifyPasswordOutcome } from './flows/verify-password-flow';

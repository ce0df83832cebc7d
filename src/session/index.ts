export { SessionSupervisor, type SupervisorDeps, type SupervisorOptions, type StateTransition } from './supervisor.js';
export { SessionStore, SESSION_FILE, MISSION_FILE } from './store.js';
export {
  ChildProcessLauncher,
  type ChildProcessLauncherOptions,
  type EnforcementHandle,
  type EnforcementLauncher
} from './enforcement.js';
export { generateSecret, splitSecret, hashSecret, verifySecret, type SecretFragments } from './secret.js';

export { Canvas, defaultResourceName } from './Canvas';
export type { ResourceOutcome, WorkspaceState } from './Canvas';
export { DEFAULT_WORKSPACE_FILE, defaultWorkspace, WorkspaceFileError, WorkspaceStore } from './WorkspaceStore';

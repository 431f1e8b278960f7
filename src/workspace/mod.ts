export { Environment, type EnvironmentTier } from "./environment.ts";
export { Shader } from "./shader.ts";
export { Workspace, normalizeShaderPath } from "./workspace.ts";
export {
  loadWorkspace,
  DEFAULT_SHADER_EXTENSIONS,
  type LoadWorkspaceOptions,
} from "./loader.ts";

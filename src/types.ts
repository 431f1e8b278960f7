export type VariableName = string;
export type ShaderPath = string;
export type ShaderSource = string;
export type ShaderLine = string;

/** Marker that opens a directive line, e.g. `//:include common.wgsl`. */
export const DIRECTIVE_MARKER = "//:";

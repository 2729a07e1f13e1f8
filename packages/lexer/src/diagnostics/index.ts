export { locate, type LineCol } from './line-col';
export { DiagnosticReport, type FormatOptions, type RenderOptions } from './report';

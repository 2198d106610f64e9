export { validateManifests, MANIFEST_REPORT_TITLE } from './manifest';
export { validateOverlay, resolveOverlayDirectory, OVERLAY_REPORT_TITLE } from './overlay';
export { validateChart, resolveChartDirectory, CHART_REPORT_TITLE, type ChartValidationOptions } from './chart';
export {
  validateSchemas,
  parseKubeconformOutput,
  SCHEMA_REPORT_TITLE,
  type SchemaValidationOptions,
} from './schema';
export {
  checkReconciler,
  reconcilerStatus,
  parseFluxTables,
  RECONCILER_STATUS_TITLE,
  type ReconcilerHealth,
  type FluxResourceRow,
} from './reconciler';
export { lintYaml, YAML_LINT_TITLE } from './yaml-syntax';

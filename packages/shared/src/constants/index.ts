export { SHEET_LIMITS, RENDER_LIMITS, DETECTION_THRESHOLDS, INGEST_LIMITS } from './limits';

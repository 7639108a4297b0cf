/**
 * Shared serialization helpers for the web API layer.
 * Converts engine results to JSON-safe objects and maps error types to HTTP status codes.
 */

import { serializePipelineResult } from '../output/json-renderer.js';
import type { PipelineErrorType, PipelineResult } from '../core/pipeline.js';
import type { ConceptDefinition, SicCode } from '../core/types.js';
import type { RatioDefinition } from '../processing/ratio-definitions.js';

// ── Error Mapping ─────────────────────────────────────────────────────

const ERROR_STATUS_MAP: Record<PipelineErrorType, number> = {
  invalid_params: 400,
  no_data: 404,
  schema_mismatch: 422,
  structural_violation: 500,
  source_unavailable: 502,
};

export function errorToHttpStatus(errorType: PipelineErrorType): number {
  return ERROR_STATUS_MAP[errorType];
}

// ── Result Serializers ────────────────────────────────────────────────

export function serializeConcepts(concepts: ConceptDefinition[]) {
  return {
    concepts: concepts.map(c => ({
      id: c.id,
      display_name: c.display_name,
      description: c.description,
      column: c.column,
      tags: c.tags,
    })),
  };
}

export function serializeRatioDefinitions(ratios: readonly RatioDefinition[]) {
  return {
    ratios: ratios.map(r => ({
      id: r.id,
      display_name: r.display_name,
      description: r.description,
      formula: r.formula,
      format: r.format,
    })),
  };
}

export function serializeRatioTable(result: PipelineResult) {
  return serializePipelineResult(result);
}

export function serializeSicCodes(codes: SicCode[]) {
  return {
    count: codes.length,
    codes: codes.map(c => ({ sic_code: c.sicCode, office: c.office, industry_title: c.industryTitle })),
  };
}

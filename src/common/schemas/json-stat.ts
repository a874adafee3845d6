/**
 * JSON-stat payloads as served by the Eurostat dissemination API.
 *
 * Only the parts the pipeline reads are modelled: the time dimension index
 * (period label -> position) and the sparse value map (position -> number).
 */

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createDataValidationError, type DataValidationError } from '@/common/types/errors.js';

export const JsonStatCubeSchema = Type.Object({
  dimension: Type.Object({
    time: Type.Object({
      category: Type.Object({
        index: Type.Record(Type.String(), Type.Integer({ minimum: 0 })),
      }),
    }),
  }),
  value: Type.Record(Type.String(), Type.Union([Type.Number(), Type.Null()])),
});

export type JsonStatCube = Static<typeof JsonStatCubeSchema>;

export interface JsonStatObservation {
  /** Time dimension label, e.g. "2024" or "2024-01" */
  period: string;
  value: Decimal;
}

const validator = TypeCompiler.Compile(JsonStatCubeSchema);

/**
 * Validates a JSON-stat cube and flattens its time dimension.
 * Positions without a value are skipped; output follows position order.
 */
export const parseJsonStatTimeSeries = (
  payload: unknown,
  source: string
): Result<JsonStatObservation[], DataValidationError> => {
  if (!validator.Check(payload)) {
    const issues = [...validator.Errors(payload)].map((e) => `${e.path}: ${e.message}`);
    return err(
      createDataValidationError(source, 'Response does not match the JSON-stat cube shape', issues)
    );
  }

  const entries = Object.entries(payload.dimension.time.category.index).sort(
    ([, a], [, b]) => a - b
  );

  const observations: JsonStatObservation[] = [];
  for (const [period, position] of entries) {
    const raw = payload.value[String(position)];
    if (raw === undefined || raw === null) continue;
    if (!Number.isFinite(raw)) {
      return err(
        createDataValidationError(source, `Value at position ${String(position)} is not finite`, [
          `${period}: ${String(raw)}`,
        ])
      );
    }
    observations.push({ period, value: new Decimal(raw) });
  }

  return ok(observations);
};

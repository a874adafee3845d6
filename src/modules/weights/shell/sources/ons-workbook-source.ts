/**
 * Primary weights adapter: downloads the ONS weights workbook, reads the
 * W1-CPI block and validates it.
 */

import { err, ok } from 'neverthrow';

import { createComponentLogger, type Logger } from '@/infra/logger/index.js';

import { parseWeightsSheet } from '../../core/parse-workbook.js';
import { validateWeights } from '../../core/validate-weights.js';
import { ONS_CPI_WEIGHTS_LAYOUT, type WeightsSheetLayout } from '../../core/workbook-layout.js';
import { logValidationWarnings } from './log-warnings.js';
import { loadWorksheet } from '../workbook-reader.js';

import type { PrimaryWeightsSource } from '../../core/ports.js';
import type { HttpClient, RetryPolicy } from '@/infra/http/index.js';

export interface OnsWorkbookSourceOptions {
  http: HttpClient;
  retry: RetryPolicy;
  logger: Logger;
  url: string;
  /** Country code stamped on every row. Default: 'UK' */
  country?: string;
  /** Default: ONS_CPI_WEIGHTS_LAYOUT */
  layout?: WeightsSheetLayout;
  /** Used to bound valid years. Default: () => new Date() */
  clock?: () => Date;
}

export const createOnsWorkbookSource = (options: OnsWorkbookSourceOptions): PrimaryWeightsSource => {
  const { http, retry, url } = options;
  const country = options.country ?? 'UK';
  const layout = options.layout ?? ONS_CPI_WEIGHTS_LAYOUT;
  const clock = options.clock ?? (() => new Date());
  const log = createComponentLogger(options.logger, 'ons-workbook-source');

  return {
    async fetchWeights() {
      log.info({ url, sheet: layout.sheetName }, 'Downloading weights workbook');

      const download = await retry.execute('ons-weights-workbook', () => http.getBuffer(url));
      if (download.isErr()) return err(download.error);

      const sheet = await loadWorksheet(download.value, layout.sheetName);
      if (sheet.isErr()) return err(sheet.error);

      const parsed = parseWeightsSheet(sheet.value, layout, country);
      if (parsed.isErr()) return err(parsed.error);

      const report = validateWeights(parsed.value, {
        source: 'ONS',
        country,
        currentYear: clock().getUTCFullYear(),
        requireAllCategories: true,
      });
      if (report.isErr()) return err(report.error);

      logValidationWarnings(log, report.value.warnings);
      log.info({ country, rows: parsed.value.length }, 'Loaded workbook weights');

      return ok(parsed.value);
    },
  };
};

// Lambda handler classifying past forecasts against realised outcomes.
//
// Endpoint: GET /forecasts/evaluation
// Inputs (query params):
//   - forecastYear: year the forecasts were published (required)
//   - targetYear: year the forecasts were about (required, after forecastYear)
//   - sectors: optional comma list (default: all sectors)
//   - sources: optional comma list of source ids (default: every source with historical forecasts)
//   - band: optional strict | moderate | loose (default: DEFAULT_TOLERANCE_BAND)
// Behavior:
//   - Fetches forecasts and actuals through the shared orchestrator, classifies them,
//     and returns the snake_case wire form. Unreachable sources are listed under `failures`.
import { evaluatePastForecasts } from "@src/analysis/evaluate_past_forecasts";
import { parseEvaluateRequest, type QueryParams } from "@src/analysis/requests";
import { toWireEvaluation } from "@src/analysis/wire";
import { getSharedLedger, type ForecastLedger } from "@src/ledger";
import { withRequestContext } from "@src/util/logger";
import { errorResponse, jsonResponse, type HandlerContext, type HandlerResponse } from "./http";

export interface EvaluateForecastsEvent {
  queryStringParameters?: QueryParams;
}

export function createHandler(resolveLedger: () => ForecastLedger = getSharedLedger) {
  return async (
    event: EvaluateForecastsEvent,
    context: HandlerContext = {}
  ): Promise<HandlerResponse> => {
    const logger = withRequestContext("functions/evaluate_forecasts", context);
    try {
      const ledger = resolveLedger();
      const request = parseEvaluateRequest(event.queryStringParameters, {
        band: ledger.settings.defaultBand,
        registry: ledger.registry,
      });
      if (!request.ok) {
        return errorResponse(400, "Invalid query", request.error);
      }

      const report = await evaluatePastForecasts(
        { ...request.data, thresholds: ledger.settings.tolerance },
        { orchestrator: ledger.orchestrator, registry: ledger.registry }
      );
      return jsonResponse(200, toWireEvaluation(report));
    } catch (err) {
      logger.error({ err }, "evaluate_forecasts failed");
      return errorResponse(500, "Internal server error");
    }
  };
}

export const handler = createHandler();

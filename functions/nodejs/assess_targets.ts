// Lambda handler estimating how likely current targets are to be met.
//
// Endpoint: GET /targets/assessment
// Inputs (query params):
//   - targetYear: year the targets fall due (required)
//   - sectors: optional comma list (default: all sectors)
//   - sources: optional comma list of source ids (default: sources with current or historical data)
//   - band: optional tolerance band for the history classification
//   - historyFrom / historyStep: optional evenly spaced history windows; default is the Five Year Plans
// Behavior:
//   - Scores every current target with sector history from past windows. Targets that
//     fail boundary checks are returned under `rejected` instead of failing the request.
import { assessFutureTargets } from "@src/analysis/assess_future_targets";
import { parseAssessRequest, type QueryParams } from "@src/analysis/requests";
import { toWireTargetAssessment } from "@src/analysis/wire";
import { getSharedLedger, type ForecastLedger } from "@src/ledger";
import { currentYear } from "@src/util/clock";
import { withRequestContext } from "@src/util/logger";
import { errorResponse, jsonResponse, type HandlerContext, type HandlerResponse } from "./http";

export interface AssessTargetsEvent {
  queryStringParameters?: QueryParams;
}

export function createHandler(resolveLedger: () => ForecastLedger = getSharedLedger) {
  return async (
    event: AssessTargetsEvent,
    context: HandlerContext = {}
  ): Promise<HandlerResponse> => {
    const logger = withRequestContext("functions/assess_targets", context);
    try {
      const ledger = resolveLedger();
      const request = parseAssessRequest(event.queryStringParameters, {
        band: ledger.settings.defaultBand,
        registry: ledger.registry,
        nowYear: currentYear(ledger.clock),
      });
      if (!request.ok) {
        return errorResponse(400, "Invalid query", request.error);
      }

      const report = await assessFutureTargets(
        { ...request.data, thresholds: ledger.settings.tolerance },
        { orchestrator: ledger.orchestrator, registry: ledger.registry },
        { clock: ledger.clock, minSampleSize: ledger.settings.minSampleSize }
      );
      return jsonResponse(200, toWireTargetAssessment(report));
    } catch (err) {
      logger.error({ err }, "assess_targets failed");
      return errorResponse(500, "Internal server error");
    }
  };
}

export const handler = createHandler();

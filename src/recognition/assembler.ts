import type {
  ApiResult,
  ExtractionUsage,
  PlateRecord,
  RecognitionFailure,
  StageResult,
} from "../types";
import { FAILURE_STATUS, type FailureStatus } from "./errors";

export function assembleResult(
  plate: StageResult<PlateRecord>,
  model: string,
  usage: ExtractionUsage | null
): ApiResult {
  if (!plate.ok) {
    return { success: false, failure: plate.failure };
  }
  return { success: true, plate: plate.value, model, usage };
}

export function failureResult(failure: RecognitionFailure): ApiResult {
  return { success: false, failure };
}

export interface RecognizeFailureBody {
  success: false;
  error: string;
  error_code: string;
  message?: string;
  status_code?: number;
  raw_content?: string;
}

export type RecognizeBody =
  | ({
      success: true;
      model: string;
      usage: ExtractionUsage | null;
    } & PlateRecord)
  | RecognizeFailureBody;

export function toHttpResponse(result: ApiResult): {
  status: 200 | FailureStatus;
  body: RecognizeBody;
} {
  if (result.success) {
    return {
      status: 200,
      body: {
        success: true,
        ...result.plate,
        model: result.model,
        usage: result.usage,
      },
    };
  }

  const { failure } = result;
  const body: RecognizeFailureBody = {
    success: false,
    error: failure.error,
    error_code: failure.kind,
  };
  if (failure.message !== undefined) body.message = failure.message;
  if (failure.statusCode !== undefined) body.status_code = failure.statusCode;
  if (failure.rawContent !== undefined) body.raw_content = failure.rawContent;
  return { status: FAILURE_STATUS[failure.kind], body };
}

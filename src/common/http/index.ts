export { buildProblemDetails, sendProblem, PROBLEM_CONTENT_TYPE } from './problem-details';
export { sendResult } from './response';
export { readBool, readDate, readInt, readNumber, readPageFilter, readString } from './query';
export {
  optionalBooleanQuery,
  optionalDateQuery,
  optionalNumberQuery,
  optionalUuidQuery,
  pageQueryValidation,
  uuidParam,
} from './validation';

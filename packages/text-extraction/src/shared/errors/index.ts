export { RecognitionError } from "./RecognitionError.js";
export { MalformedTokenError } from "./MalformedTokenError.js";

/**
 * @ocr-structure/types
 *
 * Shared result and error types for the OCR structure packages
 */

export * from "./result/index.js";

import { HearthError } from "@hearth/core";
import { outputError } from "./json-output.js";

/**
 * Exit with the error's code after printing it, as a JSON envelope when the
 * command was asked for JSON. Anything that is not a HearthError is rethrown.
 */
export function exitWithError(error: unknown, json?: boolean): never {
  if (error instanceof HearthError) {
    if (json) outputError(error.code, error.message);
    console.error(`Error: ${error.message}`);
    process.exit(error.code);
  }
  throw error;
}

import { SDKError } from "./base.js";

/**
 * Error thrown when `nextPage()` is called on the last page
 */
export class NoMorePagesError extends SDKError {
  constructor(public readonly page: number) {
    super(`No more pages after page ${page}`, "NO_MORE_PAGES");
  }
}

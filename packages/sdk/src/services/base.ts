import type { Docuflow, ListOptions } from "../client.js";
import type { Page } from "../lib/pagination.js";
import type { Decoder, RawResponse } from "../lib/response.js";
import type { RequestDescriptor, RequestOptions } from "../types/http.js";
import type { OperationStatus, PollOptions } from "../types/operations.js";

/**
 * Base class for resource layers (convert, identify, document types, ...).
 *
 * Subclasses describe their endpoints as request descriptors and decoders;
 * retrying, error mapping, paging and polling all come from the client.
 *
 * @example
 * ```typescript
 * class Conversions extends APIResource {
 *   start(url: string) {
 *     return this.post('/api/convert-async', { url }, zodDecoder(statusSchema));
 *   }
 *
 *   getStatus(id: string) {
 *     return this.get(`/api/convert-async/status/${id}`, zodDecoder(statusSchema));
 *   }
 *
 *   async run(url: string) {
 *     const status = await this.start(url);
 *     return this.waitFor(status, (id) => this.getStatus(id));
 *   }
 * }
 * ```
 */
export abstract class APIResource {
  constructor(protected readonly client: Docuflow) {}

  protected get<T>(
    path: string,
    decode: Decoder<T>,
    options?: RequestOptions,
  ): Promise<T> {
    return this.client.request({ method: "GET", path }, decode, options);
  }

  protected post<T>(
    path: string,
    body: unknown,
    decode: Decoder<T>,
    options?: RequestOptions,
  ): Promise<T> {
    return this.client.request(
      { method: "POST", path, body: { type: "json", data: body } },
      decode,
      options,
    );
  }

  protected request<T>(
    descriptor: RequestDescriptor,
    decode: Decoder<T>,
    options?: RequestOptions,
  ): Promise<T> {
    return this.client.request(descriptor, decode, options);
  }

  protected raw<T>(
    descriptor: RequestDescriptor,
    decode: Decoder<T>,
    options?: RequestOptions,
  ): Promise<RawResponse<T>> {
    return this.client.execute(descriptor, decode, options);
  }

  protected list<T>(
    descriptor: RequestDescriptor,
    decodeItem: Decoder<T>,
    options?: ListOptions,
  ): Promise<Page<T>> {
    return this.client.getPage(descriptor, decodeItem, options);
  }

  protected waitFor<S extends OperationStatus>(
    initial: S,
    fetchStatus: (operationId: string) => Promise<S>,
    options?: PollOptions<S>,
  ): Promise<S> {
    return this.client.waitForCompletion(initial, fetchStatus, options);
  }
}

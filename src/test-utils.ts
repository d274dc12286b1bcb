/**
 * Test helpers: an in-process transport and a small endpoint tree.
 */

import { packDoc, type RawDocument } from "./document.ts";
import type { RequestOptions, Transport } from "./transport.ts";

export interface RecordedRequest {
  method: string;
  url: string;
  options: RequestOptions;
}

export interface FakeResponse {
  status: number;
  method: string;
  url: string;
}

export interface FakeTransport extends Transport<FakeResponse> {
  /** Every request, in call order. */
  readonly calls: RecordedRequest[];
}

/** Records each request and answers with `respond` (200 by default). */
export function fakeTransport(
  respond: (req: RecordedRequest) => Promise<FakeResponse> = async (req) => ({
    status: 200,
    method: req.method,
    url: req.url,
  }),
): FakeTransport {
  const calls: RecordedRequest[] = [];
  return {
    calls,
    request(method, url, options) {
      const req = { method, url, options };
      calls.push(req);
      return respond(req);
    },
  };
}

/**
 * Version "1" is a board API; version "" has no version segment.
 * `boards/_board_id_` declares GET and also a static child named `get`.
 */
export function sampleDocument(): RawDocument {
  return {
    "1": {
      batch: { METHODS: [["GET", packDoc("GET /1/batch")]] },
      boards: {
        METHODS: [["POST", packDoc("POST /1/boards")]],
        _board_id_: {
          METHODS: [
            ["GET", packDoc("GET /1/boards/[board_id]")],
            ["PUT", packDoc("PUT /1/boards/[board_id]")],
          ],
          cards: {
            METHODS: [["GET", packDoc("GET /1/boards/[board_id]/cards")]],
            _filter_: {
              METHODS: [
                ["GET", packDoc("GET /1/boards/[board_id]/cards/[filter]")],
              ],
            },
          },
          members: {
            METHODS: [["GET", packDoc("GET /1/boards/[board_id]/members")]],
          },
          _field_: {
            METHODS: [["GET", packDoc("GET /1/boards/[board_id]/[field]")]],
          },
          get: {
            METHODS: [["POST", packDoc("POST /1/boards/[board_id]/get")]],
          },
        },
      },
    },
    "": {
      search: { METHODS: [["GET", packDoc("GET /search")]] },
    },
  };
}

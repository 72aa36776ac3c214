/**
 * The part of the platform response a handler needs to answer with an
 * explicit status code. Express' Response satisfies it.
 */
export interface JsonReply {
  status(code: number): JsonReply;
  json(body: unknown): unknown;
}

import type { ConversionRequest } from './conversion';

/**
 * Exchanges the base with the first target. The remaining targets keep their
 * order and the amount is untouched; with no targets the request is returned
 * unchanged. A later target equal to the old base is dropped so targets stay
 * distinct.
 */
export function swapBaseWithFirstTarget(request: ConversionRequest): ConversionRequest {
  if (request.targets.length === 0) {
    return request;
  }

  const [first, ...rest] = request.targets;
  return {
    base: first,
    targets: [request.base, ...rest.filter((code) => code !== request.base)],
    amount: request.amount,
  };
}

import { BadGatewayException } from '@nestjs/common';

// Upstream exchange call failed (network error or non-2xx status).
// Surfaces as 502; the ledger never retries.
export class UpstreamApiException extends BadGatewayException {
  constructor(message: string, cause?: unknown) {
    super(message, { cause, description: 'Upstream API error' });
  }
}

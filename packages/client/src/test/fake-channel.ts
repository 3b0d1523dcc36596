/**
 * In-process stand-in for the SOAP channel: answers from a script and
 * records what it was sent and how it was built.
 */

import type {
  PendingRequest,
  ResponseBase,
  SignRequest,
  VerifyRequest,
} from "@dssp-client/shared";
import type { ChannelBinding, ChannelFactory, DsspChannel } from "../types";

export type Operation = "sign" | "pendingRequest" | "verify";

export interface RecordedCall {
  operation: Operation;
  request: SignRequest | PendingRequest | VerifyRequest;
  awaited: boolean;
}

/** A response, a function building one from the request, or an error the channel throws */
export type Reply =
  | ResponseBase
  | Error
  | ((request: SignRequest | PendingRequest | VerifyRequest) => ResponseBase);

export class FakeService {
  readonly calls: RecordedCall[] = [];
  readonly bindings: Array<{ address: string; binding: ChannelBinding }> = [];
  private readonly replies: Reply[] = [];

  /** Queue replies, consumed in order */
  reply(...replies: Reply[]): this {
    this.replies.push(...replies);
    return this;
  }

  readonly factory: ChannelFactory = (address, binding) => {
    this.bindings.push({ address, binding });
    return this.channel();
  };

  private answer(
    operation: Operation,
    request: SignRequest | PendingRequest | VerifyRequest,
    awaited: boolean,
  ): ResponseBase {
    this.calls.push({ operation, request, awaited });
    const next = this.replies.shift();
    if (next === undefined) throw new Error(`No reply scripted for ${operation}`);
    if (next instanceof Error) throw next;
    return "result" in next ? next : next(request);
  }

  private channel(): DsspChannel {
    return {
      sign: (request) => this.answer("sign", request, false),
      signAsync: async (request) => this.answer("sign", request, true),
      pendingRequest: (request) => this.answer("pendingRequest", request, false),
      pendingRequestAsync: async (request) => this.answer("pendingRequest", request, true),
      verify: (request) => this.answer("verify", request, false),
      verifyAsync: async (request) => this.answer("verify", request, true),
    };
  }
}

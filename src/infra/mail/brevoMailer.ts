import { err, ok, type Result } from "neverthrow";
import type { ProviderError } from "../../core/entities/appError";
import type {
  DeliveryReceipt,
  OutboundEmail,
} from "../../core/entities/subscriber";
import type { MailerPort } from "../../core/ports/outboundPorts";
import { HttpJsonClient, toProviderHttpError } from "../http/httpJsonClient";

type BrevoSendResponse = {
  messageId?: string;
};

export type BrevoSender = {
  name: string;
  email: string;
};

const PROVIDER = "brevo";

/**
 * Sends transactional email through Brevo's SMTP API; one HTTP call per recipient.
 */
export class BrevoMailer implements MailerPort {
  readonly name = PROVIDER;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly sender: BrevoSender,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error("BREVO_API_KEY is required to send newsletters.");
    }

    if (!this.sender.email.trim()) {
      throw new Error("BREVO_FROM_EMAIL is required to send newsletters.");
    }
  }

  async send(
    email: OutboundEmail,
  ): Promise<Result<DeliveryReceipt, ProviderError>> {
    const url = new URL("/v3/smtp/email", this.baseUrl);

    const response = await this.httpClient.requestJson<BrevoSendResponse>({
      url: url.toString(),
      method: "POST",
      headers: {
        "api-key": this.apiKey,
        "content-type": "application/json",
        accept: "application/json",
      },
      body: {
        sender: this.sender,
        to: [{ email: email.to }],
        subject: email.subject,
        htmlContent: email.html,
      },
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(toProviderHttpError(PROVIDER, response.error));
    }

    const messageId = response.value.messageId?.trim();
    if (!messageId) {
      return err({
        provider: PROVIDER,
        code: "malformed_response",
        message: "Brevo accepted the request but returned no messageId.",
        cause: response.value,
      });
    }

    return ok({ recipient: email.to, messageId });
  }
}

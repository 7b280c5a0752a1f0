import { Dispatcher, request } from 'undici';
import jwt from 'jsonwebtoken';
import { Logger, ProviderRejected, SignatureUnavailable, createLogger, toError } from '@contractflow/shared';
import { Signer } from '../domain/document';
import { EnvelopeRequest, SignatureProvider, SigningUrl } from './signature-provider';

export interface DocuSignConfig {
  clientId: string;
  impersonatedUserId: string;
  privateKey: string;
  authServer: string;
  returnUrl: string;
  signingUrlTtlSeconds: number;
  dispatcher?: Dispatcher;
  logger?: Logger;
  now?: () => number;
}

interface AccessGrant {
  token: string;
  expiresAt: number;
  accountId: string;
  baseUri: string;
}

type HttpMethod = 'GET' | 'POST' | 'PUT';

const REFRESH_MARGIN_MS = 5 * 60 * 1000;
const TOKEN_LIFETIME_SECONDS = 3600;

class DocuSignHttpError extends Error {
  constructor(readonly statusCode: number, message: string) {
    super(message);
  }
}

const asRecord = (value: unknown): Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};

const requireString = (value: unknown, field: string): string => {
  if (typeof value !== 'string' || value.length === 0) {
    throw new DocuSignHttpError(502, `DocuSign response missing ${field}`);
  }
  return value;
};

/**
 * eSignature REST client using the JWT grant. The access token, account and
 * base URI are cached here and refreshed by a single in-flight request, so
 * callers never see credentials.
 */
export class DocuSignClient implements SignatureProvider {
  private grant?: AccessGrant;
  private pending?: Promise<AccessGrant>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly config: DocuSignConfig) {
    this.logger = (config.logger || createLogger({ serviceName: 'contract-workflow-service' })).child({
      component: 'DocuSignClient',
    });
    this.now = config.now || Date.now;
  }

  async createEnvelope(envelope: EnvelopeRequest): Promise<string> {
    const body = {
      emailSubject: `Please sign: ${envelope.title}`,
      documents: [
        {
          documentBase64: envelope.pdf.toString('base64'),
          name: envelope.title,
          fileExtension: 'pdf',
          documentId: '1',
        },
      ],
      recipients: {
        signers: envelope.signers.map((signer, i) => ({
          email: signer.email,
          name: signer.name,
          recipientId: String(i + 1),
          routingOrder: String(i + 1),
          clientUserId: signer.clientUserId,
        })),
      },
      customFields: {
        textCustomFields: [{ name: 'documentId', value: envelope.documentId, show: 'false' }],
      },
      status: 'sent',
    };

    const json = await this.api('POST', '/envelopes', body);
    const envelopeId = requireString(asRecord(json).envelopeId, 'envelopeId');
    this.logger.info('Envelope created', { envelopeId, documentId: envelope.documentId });
    return envelopeId;
  }

  async getSigningUrl(envelopeId: string, signer: Signer): Promise<SigningUrl> {
    const json = await this.api('POST', `/envelopes/${encodeURIComponent(envelopeId)}/views/recipient`, {
      authenticationMethod: 'none',
      clientUserId: signer.clientUserId,
      returnUrl: this.config.returnUrl,
      userName: signer.name,
      email: signer.email,
    });
    return {
      url: requireString(asRecord(json).url, 'url'),
      expiresAt: new Date(this.now() + this.config.signingUrlTtlSeconds * 1000),
    };
  }

  async getEnvelopeStatus(envelopeId: string): Promise<string> {
    const json = await this.api('GET', `/envelopes/${encodeURIComponent(envelopeId)}`);
    return requireString(asRecord(json).status, 'status');
  }

  async voidEnvelope(envelopeId: string, reason: string): Promise<void> {
    await this.api('PUT', `/envelopes/${encodeURIComponent(envelopeId)}`, { status: 'voided', voidedReason: reason });
    this.logger.info('Envelope voided', { envelopeId });
  }

  private async api(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    try {
      const grant = await this.session();
      return await this.send(method, `${grant.baseUri}/restapi/v2.1/accounts/${grant.accountId}${path}`, {
        authorization: `Bearer ${grant.token}`,
        'content-type': 'application/json',
      }, body === undefined ? undefined : JSON.stringify(body));
    } catch (err) {
      throw this.classify(err);
    }
  }

  private classify(err: unknown): Error {
    if (err instanceof DocuSignHttpError) {
      if (err.statusCode === 401) {
        this.grant = undefined;
      }
      const transient = err.statusCode >= 500 || [401, 408, 429].includes(err.statusCode);
      return transient ? new SignatureUnavailable(err.message, err) : new ProviderRejected(err.message, err);
    }
    const error = toError(err);
    return new SignatureUnavailable(`DocuSign request failed: ${error.message}`, error);
  }

  private async session(): Promise<AccessGrant> {
    if (this.grant && this.grant.expiresAt - REFRESH_MARGIN_MS > this.now()) {
      return this.grant;
    }
    if (!this.pending) {
      this.pending = this.authenticate().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  private async authenticate(): Promise<AccessGrant> {
    const authBase = `https://${this.config.authServer}`;
    const assertion = jwt.sign(
      { iss: this.config.clientId, sub: this.config.impersonatedUserId, aud: this.config.authServer, scope: 'signature impersonation' },
      this.config.privateKey,
      { algorithm: 'RS256', expiresIn: TOKEN_LIFETIME_SECONDS }
    );

    const form = new URLSearchParams({
      grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
      assertion,
    });
    const tokenJson = asRecord(
      await this.send('POST', `${authBase}/oauth/token`, { 'content-type': 'application/x-www-form-urlencoded' }, form.toString())
    );
    const token = requireString(tokenJson.access_token, 'access_token');
    const expiresIn = typeof tokenJson.expires_in === 'number' ? tokenJson.expires_in : TOKEN_LIFETIME_SECONDS;

    const userInfo = asRecord(await this.send('GET', `${authBase}/oauth/userinfo`, { authorization: `Bearer ${token}` }));
    const accounts = Array.isArray(userInfo.accounts) ? userInfo.accounts.map(asRecord) : [];
    const account = accounts.find((a) => a.is_default === true) || accounts[0];
    if (!account) {
      throw new DocuSignHttpError(403, 'DocuSign user has no accounts');
    }

    const grant: AccessGrant = {
      token,
      expiresAt: this.now() + expiresIn * 1000,
      accountId: requireString(account.account_id, 'account_id'),
      baseUri: requireString(account.base_uri, 'base_uri').replace(/\/$/, ''),
    };
    this.grant = grant;
    this.logger.info('DocuSign access token refreshed', { accountId: grant.accountId });
    return grant;
  }

  private async send(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: string
  ): Promise<unknown> {
    const res = await request(url, { method, headers, body, dispatcher: this.config.dispatcher });
    const text = await res.body.text();
    if (res.statusCode >= 400) {
      throw new DocuSignHttpError(res.statusCode, `DocuSign ${method} ${new URL(url).pathname} responded ${res.statusCode}`);
    }
    return text.length > 0 ? JSON.parse(text) : {};
  }
}

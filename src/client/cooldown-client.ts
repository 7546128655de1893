export interface CooldownClientOptions {
  baseUrl: string;
  token: string;
  fetchImpl?: typeof fetch;
}

export type TriggerOutcome = { allowed: true } | { allowed: false; remainingSeconds: number };

export interface CooldownStatusResponse {
  actor_id: string;
  state: 'available' | 'cooldown';
  remaining_seconds: number;
  expires_at?: number;
}

export interface InfoResponse {
  active_cooldowns: number;
  cooldown_seconds: number;
  config_valid: boolean;
  cooldowns: Array<{ actor_id: string; remaining_seconds: number }>;
}

export class CooldownClientError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'CooldownClientError';
  }
}

export class CooldownClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: CooldownClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async trigger(): Promise<TriggerOutcome> {
    const response = await this.request('POST', '/trigger');
    if (response.status === 429) {
      const body = (await response.json()) as { remaining_seconds?: number };
      return { allowed: false, remainingSeconds: body.remaining_seconds ?? 0 };
    }
    await this.ensureOk(response, 'Trigger');
    return { allowed: true };
  }

  async status(actorId?: string): Promise<CooldownStatusResponse> {
    const path = actorId ? `/cooldowns/${encodeURIComponent(actorId)}` : '/cooldowns/me';
    const response = await this.request('GET', path);
    await this.ensureOk(response, 'Status request');
    return (await response.json()) as CooldownStatusResponse;
  }

  async reset(actorId: string): Promise<void> {
    const response = await this.request('DELETE', `/cooldowns/${encodeURIComponent(actorId)}`);
    await this.ensureOk(response, 'Reset');
  }

  async info(): Promise<InfoResponse> {
    const response = await this.request('GET', '/info');
    await this.ensureOk(response, 'Info request');
    return (await response.json()) as InfoResponse;
  }

  async reload(): Promise<void> {
    const response = await this.request('POST', '/reload');
    await this.ensureOk(response, 'Reload');
  }

  private async request(method: string, path: string): Promise<Response> {
    const endpoint = new URL(path, this.options.baseUrl);
    return this.fetchImpl(endpoint.toString(), {
      method,
      headers: { authorization: `Bearer ${this.options.token}` },
    });
  }

  private async ensureOk(response: Response, action: string): Promise<void> {
    if (!response.ok) {
      const text = await response.text();
      throw new CooldownClientError(response.status, `${action} failed: ${response.status} ${text}`);
    }
  }
}

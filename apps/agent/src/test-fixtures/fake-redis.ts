import {
  CAS_SAVE_SCRIPT,
  RELEASE_LOCK_SCRIPT
} from '../app/checkpoint/redis-checkpoint.store';
import { isRecord, safeParseJson } from '../app/common/json.util';

interface Entry {
  value: string;
  expiresAt: number | null;
}

type PipelineResult = [Error | null, unknown][];

/**
 * In-process stand-in for the subset of ioredis the agent uses. Commands run
 * synchronously inside a resolved promise, so each one is atomic.
 */
export class FakeRedis {
  /** When true every command rejects as if the connection dropped. */
  failing = false;
  readonly commands: string[] = [];

  private readonly entries = new Map<string, Entry>();

  async get(key: string): Promise<string | null> {
    this._guard('get');
    return this._read(key)?.value ?? null;
  }

  async set(
    key: string,
    value: string,
    ...args: (string | number)[]
  ): Promise<'OK' | null> {
    this._guard('set');
    let ttlMs: number | null = null;
    let onlyIfAbsent = false;
    for (let i = 0; i < args.length; i++) {
      const flag = String(args[i]).toUpperCase();
      if (flag === 'PX') ttlMs = Number(args[++i]);
      else if (flag === 'EX') ttlMs = Number(args[++i]) * 1000;
      else if (flag === 'NX') onlyIfAbsent = true;
    }
    if (onlyIfAbsent && this._read(key)) return null;
    this._write(key, value, ttlMs);
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    this._guard('del');
    return keys.filter((key) => this.entries.delete(key)).length;
  }

  async incr(key: string): Promise<number> {
    this._guard('incr');
    return this._incr(key);
  }

  async pexpire(key: string, ms: number): Promise<number> {
    this._guard('pexpire');
    return this._pexpire(key, ms);
  }

  async ttl(key: string): Promise<number> {
    const entry = this._read(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.ceil((entry.expiresAt - Date.now()) / 1000);
  }

  async eval(
    script: string,
    numKeys: number,
    ...args: (string | number)[]
  ): Promise<unknown> {
    this._guard('eval');
    const [key, ...argv] = args.map(String);
    if (numKeys !== 1) throw new Error(`FakeRedis: unsupported numKeys ${numKeys}`);

    if (script === CAS_SAVE_SCRIPT) {
      const current = this._read(key);
      const stored = current ? safeParseJson(current.value, null) : null;
      const version =
        isRecord(stored) && typeof stored.version === 'number'
          ? stored.version
          : 0;
      if (version !== Number(argv[0])) return 0;
      this._write(key, argv[1], Number(argv[2]) * 1000);
      return 1;
    }

    if (script === RELEASE_LOCK_SCRIPT) {
      if (this._read(key)?.value !== argv[0]) return 0;
      this.entries.delete(key);
      return 1;
    }

    throw new Error('FakeRedis: unknown script');
  }

  multi(): FakePipeline {
    return new FakePipeline(this);
  }

  async ping(): Promise<string> {
    this._guard('ping');
    return 'PONG';
  }

  async quit(): Promise<'OK'> {
    return 'OK';
  }

  /** @internal used by FakePipeline */
  _exec(ops: [string, (string | number)[]][]): PipelineResult {
    this._guard('exec');
    return ops.map(([op, args]) => {
      if (op === 'incr') return [null, this._incr(String(args[0]))];
      if (op === 'pexpire') {
        return [null, this._pexpire(String(args[0]), Number(args[1]))];
      }
      return [new Error(`FakeRedis: unsupported pipeline op ${op}`), null];
    });
  }

  private _incr(key: string): number {
    const entry = this._read(key);
    const next = Number(entry?.value ?? 0) + 1;
    this.entries.set(key, {
      value: String(next),
      expiresAt: entry?.expiresAt ?? null
    });
    return next;
  }

  private _pexpire(key: string, ms: number): number {
    const entry = this._read(key);
    if (!entry) return 0;
    entry.expiresAt = Date.now() + ms;
    return 1;
  }

  private _read(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private _write(key: string, value: string, ttlMs: number | null): void {
    this.entries.set(key, {
      value,
      expiresAt: ttlMs === null ? null : Date.now() + ttlMs
    });
  }

  private _guard(command: string): void {
    this.commands.push(command);
    if (this.failing) throw new Error('Connection is closed.');
  }
}

export class FakePipeline {
  private readonly ops: [string, (string | number)[]][] = [];

  constructor(private readonly redis: FakeRedis) {}

  incr(key: string): this {
    this.ops.push(['incr', [key]]);
    return this;
  }

  pexpire(key: string, ms: number): this {
    this.ops.push(['pexpire', [key, ms]]);
    return this;
  }

  async exec(): Promise<PipelineResult> {
    return this.redis._exec(this.ops);
  }
}

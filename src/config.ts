export type RendezvousPolicy = 'max' | 'min';

export interface HashmixConfig {
  debug: boolean;
  logLimit: number; // 0 = unlimited
  rendezvousPolicy: RendezvousPolicy;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: Readonly<HashmixConfig> = {
  debug: false,
  logLimit: 1000,
  rendezvousPolicy: 'max',
};

export function processEnv(): Env {
  return typeof process !== 'undefined' && process?.env ? process.env : {};
}

// Unparseable values fall back to the defaults.
export function resolveConfig(env: Env = processEnv()): HashmixConfig {
  const debug = (env.HASHMIX_DEBUG ?? '0') === '1';

  let logLimit = DEFAULT_CONFIG.logLimit;
  const limitRaw = env.HASHMIX_LOG_LIMIT;
  if (limitRaw !== undefined && /^\d+$/.test(limitRaw.trim())) {
    logLimit = Number(limitRaw.trim());
  }

  const policyRaw = (env.HASHMIX_RENDEZVOUS_POLICY ?? '').trim().toLowerCase();
  const rendezvousPolicy: RendezvousPolicy = policyRaw === 'min' || policyRaw === 'max' ? policyRaw : DEFAULT_CONFIG.rendezvousPolicy;

  return { debug, logLimit, rendezvousPolicy };
}

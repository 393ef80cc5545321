/**
 * Default Configuration Values
 *
 * Defaults for every harness setting. Values in the secrets file override the
 * gateway and credential sections; everything else is fixed by the layout the
 * gateway image expects.
 */

/** Secrets file keys understood by the harness and the compose file */
export const ENV_KEYS = {
  apiKey: 'OPENAI_API_KEY',
  gatewayToken: 'OPENCLAW_GATEWAY_TOKEN',
  image: 'OPENCLAW_IMAGE',
  bindIp: 'OPENCLAW_BIND_IP',
  gatewayPort: 'OPENCLAW_GATEWAY_PORT',
  bridgePort: 'OPENCLAW_BRIDGE_PORT',
  readinessProbe: 'OPENCLAW_READINESS_PROBE',
} as const;

export const DEFAULT_PROJECT_FILES = {
  envFile: '.env',
  envExampleFile: '.env.example',
  templateFile: 'openclaw.template.json',
  composeFile: 'docker-compose.yml',
} as const;

/**
 * Persisted runtime layout. uid 1000 is the `node` user inside the gateway
 * container.
 */
export const DEFAULT_RUNTIME = {
  dataDir: 'data/openclaw',
  configFileName: 'openclaw.json',
  subdirectories: ['workspace', 'agents/main/sessions', 'credentials', 'devices'],
  ownerUid: 1000,
  ownerGid: 1000,
  dirMode: 0o700,
  fileMode: 0o600,
} as const;

export const DEFAULT_GATEWAY = {
  service: 'openclaw-gateway',
  cliService: 'openclaw-cli',
  containerName: 'openclaw-gateway',
  image: 'openclaw:local',
  bindIp: '127.0.0.1',
  port: 18789,
  bridgePort: 18790,
} as const;

export const DEFAULT_READINESS = {
  probe: 'log',
  /** Printed by the gateway once its WebSocket server accepts connections */
  marker: 'listening on ws://',
  attempts: 15,
  intervalMs: 2000,
  /** Pause after the post-doctor restart */
  settleMs: 5000,
  doctorOutputLines: 5,
} as const;

/**
 * Substrings that mark a credential as an unfilled template value
 */
export const PLACEHOLDER_MARKERS = ['your-openai', 'your-key-here', 'changeme'] as const;

export const DOCKER_INSTALL_URL = 'https://docs.docker.com/engine/install/';

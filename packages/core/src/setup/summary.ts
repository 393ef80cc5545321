/**
 * Setup Summary
 *
 * Connection details and next steps printed after a successful setup.
 */

import type { HarnessConfig } from '../config/index.js';

export interface SetupSummary {
  gatewayUrl: string;
  controlUiUrl: string;
  whatsappLoginCommand: string;
  statusCommands: string[];
  usefulCommands: Array<{ command: string; description: string }>;
}

export function buildSetupSummary(config: HarnessConfig): SetupSummary {
  const { bindIp, port, token, containerName, service } = config.gateway;
  const gatewayUrl = `http://${bindIp}:${port}`;
  const exec = `docker exec ${containerName} node openclaw.mjs`;

  return {
    gatewayUrl,
    controlUiUrl: `${gatewayUrl}/#token=${token ?? ''}`,
    whatsappLoginCommand: `docker exec -it ${containerName} node openclaw.mjs channels login --channel whatsapp`,
    statusCommands: [`${exec} status`, `${exec} channels status`],
    usefulCommands: [
      { command: `docker compose logs -f ${service}`, description: 'Live logs' },
      { command: `docker compose restart ${service}`, description: 'Restart' },
      { command: 'docker compose down', description: 'Stop' },
      { command: 'clawharbor reset', description: 'Wipe and start over' },
    ],
  };
}

const RULE = '========================================';

export function renderBanner(title: string): string[] {
  return ['', RULE, `   ${title}`, RULE, ''];
}

export function renderSetupSummary(summary: SetupSummary): string[] {
  const width = Math.max(...summary.usefulCommands.map((entry) => entry.command.length)) + 2;

  return [
    ...renderBanner('Setup Complete'),
    `  Gateway:    ${summary.gatewayUrl}`,
    `  Control UI: ${summary.controlUiUrl}`,
    '',
    '  Next steps:',
    '',
    '  1. Open the Control UI link above in your browser.',
    '     (The token is in the URL, so the UI connects without pairing.)',
    '',
    '  2. Link WhatsApp:',
    `     ${summary.whatsappLoginCommand}`,
    '     Then scan the QR code: WhatsApp > Settings > Linked Devices > Link a Device',
    '',
    '  3. Verify everything:',
    ...summary.statusCommands.map((command) => `     ${command}`),
    '',
    '  Useful commands:',
    ...summary.usefulCommands.map(
      (entry) => `     ${entry.command.padEnd(width)}# ${entry.description}`
    ),
    '',
  ];
}

#!/usr/bin/env node
/*
 Command line entry.
 Usage: opcua-telemetry-logger [run | browse [filter] | export [out.xlsx] | help]
 Settings come from the environment (.env), see .env.example.
*/
import { AcquisitionConfig, loadConfig, MODE } from './config/config';
import { describeError, ValidationError } from './errors/CustomError';
import { exportRecordsToXlsx } from './scripts/exportRecordsXlsx';
import { AcquisitionStatus } from './services/AcquisitionStatusService';
import { DurableLogger } from './services/DurableLogger';
import { ExitCode, LifecycleController } from './services/LifecycleController';
import { MqttPublisher } from './services/MqttPublisher';
import { OpcUaHandle, OpcUaProtocolClient } from './services/opcua/OpcUaProtocolClient';
import { SessionManager } from './services/SessionManager';
import {
  closeStatusServer,
  createStatusServer,
  listenStatusServer,
  StatusServer,
} from './server';

type Command = 'run' | 'browse' | 'export' | 'help';

const COMMANDS: readonly Command[] = ['run', 'browse', 'export', 'help'];

const isCommand = (raw: string): raw is Command =>
  (COMMANDS as readonly string[]).includes(raw);

function printHelp() {
  const commands: Array<[string, string]> = [
    ['run', 'poll the data point and append readings to the log file until interrupted (default)'],
    ['browse [filter]', 'list the server address space below BROWSE_ROOT_ID and exit'],
    ['export [out.xlsx]', 'convert the log file to an Excel workbook'],
    ['help', 'show this help'],
  ];
  console.log('Commands:');
  for (const [k, v] of commands) console.log(` - ${k}: ${v}`);
  console.log('Exit codes: 0 clean, 1 unexpected, 2 connect fatal, 3 write fatal, 4 browse failed, 5 invalid config');
}

function buildController(config: AcquisitionConfig): LifecycleController<OpcUaHandle> {
  const client = new OpcUaProtocolClient({ unit: config.unit });
  const sessions = new SessionManager(client, config.endpoint, {
    connectTimeoutMs: config.connectTimeoutMs,
    backoff: config.backoff,
  });
  sessions.on('state', change => AcquisitionStatus.setSessionState(change.to));
  return new LifecycleController({
    sessions,
    client,
    logger: new DurableLogger(config.logFilePath),
    settings: {
      dataPointId: config.dataPointId,
      pollIntervalMs: config.pollIntervalMs,
      readTimeoutMs: config.readTimeoutMs,
      maxBrowseDepth: config.maxBrowseDepth,
      browseRootId: config.browseRootId,
    },
  });
}

async function runAcquisition(
  config: AcquisitionConfig,
  controller: LifecycleController<OpcUaHandle>,
): Promise<ExitCode> {
  let status: StatusServer | null = null;
  let publisher: MqttPublisher | null = null;
  try {
    AcquisitionStatus.setLiveEmitEnabled(config.liveEmitEnabled);
    controller.on('reading', reading => AcquisitionStatus.onReading(reading));

    if (config.statusPort !== null) {
      status = createStatusServer(MODE);
      const port = await listenStatusServer(status, config.statusPort);
      console.log(`[Status] Listening on port ${port}`);
    }
    if (config.mqtt) {
      const mqttPublisher = new MqttPublisher(config.mqtt.broker, config.mqtt.topic);
      mqttPublisher.start();
      controller.on('reading', reading => mqttPublisher.forward(reading));
      publisher = mqttPublisher;
    }

    return await controller.run();
  } finally {
    publisher?.stop();
    if (status) await closeStatusServer(status);
  }
}

export const main = async (argv: string[] = process.argv.slice(2)): Promise<ExitCode> => {
  const raw = (argv[0] || 'run').toLowerCase();
  if (raw === 'help' || raw === '--help' || raw === '-h') {
    printHelp();
    return ExitCode.Clean;
  }
  if (!isCommand(raw)) {
    console.error(`Unknown command: ${raw}`);
    printHelp();
    return ExitCode.Unexpected;
  }

  let config: AcquisitionConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ValidationError) {
      console.error(`[Config] ${err.message}`);
      for (const d of err.details ?? []) {
        console.error(` - ${d.field}: ${d.message}${d.value !== undefined ? ` (got "${d.value}")` : ''}`);
      }
      return ExitCode.InvalidConfig;
    }
    throw err;
  }

  if (raw === 'export') {
    try {
      await exportRecordsToXlsx(config.logFilePath, argv[1]);
      return ExitCode.Clean;
    } catch (err) {
      console.error(`[Export] ${describeError(err)}`);
      return ExitCode.Unexpected;
    }
  }

  const controller = buildController(config);
  const onSignal = (signal: NodeJS.Signals) => controller.requestShutdown(`${signal} received`);
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  try {
    return raw === 'browse'
      ? await controller.browse(argv[1])
      : await runAcquisition(config, controller);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
};

if (require.main === module) {
  main()
    .then(code => process.exit(code))
    .catch(err => {
      console.error('[Lifecycle] Unexpected error:', err);
      process.exit(ExitCode.Unexpected);
    });
}

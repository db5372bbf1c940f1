import {
  ACME_DIRECTORIES,
  loadConfig,
  run,
  type ConfigInput,
  type OrchestrationState,
  type ToolConfig,
} from '../../lib/index.js';
import { createSpinner, createSpinnerLogger, heading, kv, render } from '../logger.js';

/** Flags and options accepted by the issue command */
export interface IssueCommandOptions {
  config: string;
  domain?: string[];
  zone?: string[];
  staging?: boolean;
  directory?: string;
  propagationWait?: number;
  onPropagationTimeout?: string;
  certAlgo?: string;
  accountKey?: string;
  output?: string;
}

const STATE_LABELS: Record<OrchestrationState, string> = {
  idle: 'Starting',
  preCleanup: 'Removed stale challenge records',
  orderPlaced: 'Order placed',
  targetsResolved: 'Challenge records resolved',
  recordsPublished: 'TXT records published, waiting for propagation',
  propagationConfirmed: 'Propagation checked, answering challenges',
  challengesAnswered: 'Challenges answered, waiting for validation',
  validationPolled: 'Authorizations valid',
  cleanup: 'Challenge records removed',
  finalized: 'Order finalized',
  issued: 'Certificate issued',
  failed: 'Run failed',
};

/** Command line flags as configuration keys; unset flags stay undefined */
export function issueOverrides(options: IssueCommandOptions): ConfigInput {
  return {
    domains: options.domain,
    zones: options.zone,
    acmeDirectoryUrl: options.directory ?? (options.staging ? ACME_DIRECTORIES.staging : undefined),
    dnsPropagationWaitSeconds: options.propagationWait,
    propagationTimeoutPolicy: options.onPropagationTimeout,
    certificateAlgorithm: options.certAlgo,
    accountKeyPath: options.accountKey,
    outputDir: options.output,
  };
}

function showConfiguration(config: ToolConfig): void {
  heading('Configuration');
  kv('Domains', config.domains.join(', '));
  kv('Directory', config.acmeDirectoryUrl);
  kv('OVH endpoint', config.providerCredentials.endpoint);
  kv('Propagation wait', `${config.dnsPropagationWaitSeconds}s (${config.propagationTimeoutPolicy} on timeout)`);
  kv('Output', config.outputDir);
}

/** Obtain or renew the certificate described by the configuration file */
export async function handleIssueCommand(options: IssueCommandOptions): Promise<void> {
  const config = await loadConfig(options.config, { overrides: issueOverrides(options) });
  showConfiguration(config);

  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onSigint);

  const spinner = createSpinner().start(STATE_LABELS.idle);
  try {
    const result = await run(config, {
      logger: createSpinnerLogger(spinner),
      signal: controller.signal,
      onStateChange: (_from, to) => {
        if (to !== 'failed' && to !== 'issued') spinner.start(STATE_LABELS[to]);
      },
    });

    if (result.cleanup.error) {
      render.warn(result.cleanup.error.message);
    }

    if (result.kind === 'failed') {
      spinner.fail(`Run failed after "${result.lastState}"`);
      throw result.error;
    }

    spinner.succeed(STATE_LABELS.issued);
    if (result.warnings.length) {
      render.warn(`${result.warnings.length} warning(s):`);
      render.list(result.warnings);
    }
    if (result.files) {
      kv('Certificate', result.files.certificatePath);
      kv('Private key', result.files.privateKeyPath);
    }
  } finally {
    spinner.stop();
    process.removeListener('SIGINT', onSigint);
  }
}

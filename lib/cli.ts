import chalk, { type ChalkInstance } from 'chalk';
import { Command, Option } from 'commander';
import type { ImageBuilder } from './builder.js';
import { resolveConfig, type ConfigOptions, type ImagesmithConfig } from './config.js';
import { DockerClient } from './docker-client.js';
import { DockerImageBuilder } from './docker-builder.js';
import { isStructuralError } from './errors.js';
import { configureLogging, createLogger, LOG_LEVELS } from './logger.js';
import { loadManifest } from './manifest.js';
import { Orchestrator } from './orchestrator.js';
import { FileRecordStore } from './record-store.js';
import { formatOutcome, formatPlan, formatSummary, formatUnitList } from './report.js';
import { getErrorMessage } from './util.js';
import { VERSION } from './version.js';

const log = createLogger('cli');

export const EXIT_OK = 0;
export const EXIT_BUILD_FAILED = 1;
export const EXIT_INVALID = 2;

export interface CliOptions extends ConfigOptions {
    dryRun?: boolean;
    list?: boolean;
    printDockerfile?: boolean;
}

export interface BuilderSession {
    builder: ImageBuilder;
    close(): Promise<void>;
}

export interface CliDependencies {
    write?: (line: string) => void;
    colors?: ChalkInstance;
    /** Opens the image builder; only called when something is built */
    openBuilder?: (config: ImagesmithConfig) => Promise<BuilderSession>;
}

async function openDockerBuilder(config: ImagesmithConfig): Promise<BuilderSession> {
    const client = config.dockerHost
        ? await DockerClient.fromDockerHost(
              config.dockerHost,
              process.env.DOCKER_CERT_PATH,
          )
        : await DockerClient.fromDockerConfig();
    const apiVersion = await client.systemPing();
    log.debug('connected to engine', { apiVersion });
    return {
        builder: new DockerImageBuilder(client, {
            pull: config.pull,
            platform: config.platform,
        }),
        close: () => client.close(),
    };
}

// A builder that failed to open has already failed its builds
async function closeSession(opening: Promise<BuilderSession>): Promise<void> {
    let session: BuilderSession;
    try {
        session = await opening;
    } catch (error) {
        log.debug('builder was never opened', { error: getErrorMessage(error) });
        return;
    }
    await session.close();
}

/**
 * Execute one CLI invocation.
 * @returns the process exit code
 */
export async function runCli(
    targets: string[],
    options: CliOptions,
    deps: CliDependencies = {},
): Promise<number> {
    const write = deps.write ?? ((line: string) => process.stdout.write(line + '\n'));
    const colors = deps.colors ?? chalk;
    const openBuilder = deps.openBuilder ?? openDockerBuilder;

    let opening: Promise<BuilderSession> | undefined;
    try {
        const config = resolveConfig(options);
        configureLogging({ level: config.logLevel, json: config.logJson });

        const manifest = await loadManifest(config.manifest);
        const records = new FileRecordStore(config.records);

        const lazyBuilder: ImageBuilder = {
            build: async (request, signal) => {
                opening ??= openBuilder(config);
                const session = await opening;
                return session.builder.build(request, signal);
            },
        };
        const orchestrator = new Orchestrator({
            manifest,
            builder: lazyBuilder,
            records,
            concurrency: config.concurrency,
            timeoutMs: config.timeoutMs,
            repository: config.repository,
            tag: config.tag,
            noCache: config.noCache,
            force: config.force,
            onTransition: (outcome) => {
                if (outcome.status !== 'pending') {
                    write(formatOutcome(outcome, colors));
                }
            },
        });

        if (options.list) {
            const all = await records.entries();
            formatUnitList(orchestrator.registry, orchestrator.graph, all, colors).forEach(write);
            return EXIT_OK;
        }

        if (options.printDockerfile) {
            for (const unit of orchestrator.targets(targets)) {
                write(colors.dim(`# ----- ${unit} -----`));
                write(orchestrator.dockerfile(unit).trimEnd());
            }
            return EXIT_OK;
        }

        if (options.dryRun) {
            const { plan } = await orchestrator.plan(targets);
            formatPlan(plan.decisions, colors).forEach(write);
            return EXIT_OK;
        }

        const summary = await orchestrator.run(targets);
        formatSummary(summary, colors).forEach(write);
        return summary.ok ? EXIT_OK : EXIT_BUILD_FAILED;
    } catch (error) {
        if (isStructuralError(error)) {
            log.error(error.message);
            return EXIT_INVALID;
        }
        log.error('unexpected failure', { error: getErrorMessage(error) });
        return EXIT_BUILD_FAILED;
    } finally {
        if (opening) {
            await closeSession(opening);
        }
    }
}

export function createProgram(deps: CliDependencies = {}): Command {
    const program = new Command();
    program
        .name('imagesmith')
        .description(
            'Build container images from a manifest of recipes that inherit from one another, rebuilding only what changed',
        )
        .version(VERSION)
        .argument('[targets...]', 'units to build (default: _ALL_, or every unit)')
        .option('-f, --file <path>', 'manifest file')
        .option('--records <dir>', 'directory holding build records')
        .option('-j, --concurrency <n>', 'number of parallel builds')
        .option('--timeout <seconds>', 'deadline of each build')
        .option('--repository <repository>', 'repository prefix for built images')
        .option('-t, --tag <tag>', 'tag for built images')
        .option('-H, --host <address>', 'engine address, e.g. unix:/var/run/docker.sock')
        .option('--no-cache', 'do not use the engine layer cache')
        .option('--pull', 'always pull newer versions of base images')
        .option('--platform <platform>', 'target platform, e.g. linux/arm64')
        .option('--force', 'rebuild regardless of fingerprints')
        .option('--dry-run', 'print the build plan without building')
        .option('--list', 'list the units of the manifest')
        .option('--print-dockerfile', 'print the composed Dockerfile of each target')
        .addOption(
            new Option('--log-level <level>', 'log verbosity').choices(LOG_LEVELS),
        )
        .option('--log-json', 'log JSON lines')
        .action(async (targets: string[], options: CliOptions) => {
            process.exitCode = await runCli(targets, options, deps);
        });
    return program;
}

import { DockerComposeEnvironment, getContainerRuntimeClient } from "testcontainers";
import { createChildLogger, type Logger } from "./logger";

export interface ComposeProject {
  /** Directory holding the compose file. */
  directory: string;
  file: string;
  projectName: string;
}

export interface ServiceEndpoints {
  host(service: string): string;
  /** Host-side port published for `containerPort` of the service. */
  portFor(service: string, containerPort: number): number;
}

export interface ComposeRuntime {
  up(project: ComposeProject): Promise<ServiceEndpoints>;
  /** Removes the project's containers and volumes. Must succeed when nothing is running. */
  down(project: ComposeProject): Promise<void>;
}

export class TestcontainersComposeRuntime implements ComposeRuntime {
  async up(project: ComposeProject): Promise<ServiceEndpoints> {
    const environment = await new DockerComposeEnvironment(project.directory, project.file)
      .withProjectName(project.projectName)
      .up();

    // compose v2 names the first replica of a service "<service>-1"
    const containerOf = (service: string) => environment.getContainer(`${service}-1`);

    return {
      host: (service) => containerOf(service).getHost(),
      portFor: (service, containerPort) => containerOf(service).getMappedPort(containerPort)
    };
  }

  async down(project: ComposeProject): Promise<void> {
    const client = await getContainerRuntimeClient();
    await client.compose.down(
      { filePath: project.directory, files: project.file, projectName: project.projectName },
      { removeVolumes: true, timeout: 0 }
    );
  }
}

/**
 * The running dependency set of one test session. Created with
 * {@link ComposeSession.start} and handed to whoever needs the endpoints;
 * {@link ComposeSession.stop} tears it down.
 */
export class ComposeSession implements ServiceEndpoints {
  private stopping: Promise<void> | undefined;

  private constructor(
    private readonly runtime: ComposeRuntime,
    readonly project: ComposeProject,
    private readonly endpoints: ServiceEndpoints,
    private readonly logger: Logger
  ) {}

  static async start(
    runtime: ComposeRuntime,
    project: ComposeProject,
    logger: Logger = createChildLogger({ component: "compose" })
  ): Promise<ComposeSession> {
    const bindings = { projectName: project.projectName, file: project.file };

    // A previous session may have been killed before its teardown ran
    logger.info(bindings, "removing leftover containers");
    await runtime.down(project);

    logger.info(bindings, "starting compose project");
    let endpoints: ServiceEndpoints;
    try {
      endpoints = await runtime.up(project);
    } catch (error) {
      try {
        await runtime.down(project);
      } catch (cleanupError) {
        logger.error({ ...bindings, err: cleanupError }, "cleanup after failed start failed");
      }
      throw error;
    }

    logger.info(bindings, "compose project started");
    return new ComposeSession(runtime, project, endpoints, logger);
  }

  host(service: string): string {
    return this.endpoints.host(service);
  }

  portFor(service: string, containerPort: number): number {
    return this.endpoints.portFor(service, containerPort);
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.logger.info({ projectName: this.project.projectName }, "stopping compose project");
      this.stopping = this.runtime.down(this.project);
    }
    return this.stopping;
  }
}

export async function withComposeSession<T>(
  runtime: ComposeRuntime,
  project: ComposeProject,
  fn: (session: ComposeSession) => Promise<T>,
  logger?: Logger
): Promise<T> {
  const session = await ComposeSession.start(runtime, project, logger);
  try {
    return await fn(session);
  } finally {
    await session.stop();
  }
}

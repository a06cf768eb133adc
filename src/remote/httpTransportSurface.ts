import Fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import { NOW_PLAYING_FALLBACK_TITLE } from "../constants.js";
import { componentLogger, type Logger } from "../logger.js";
import type {
  NowPlayingInfo,
  RemoteTransportSurface,
  TransportCommand,
  TransportCommandHandler,
} from "../playback/transportSurface.js";
import type { Unsubscribe } from "../types.js";

const CommandSchema = z.discriminatedUnion("command", [
  z.object({ command: z.literal("play") }),
  z.object({ command: z.literal("pause") }),
  z.object({ command: z.literal("togglePlayPause") }),
  z.object({ command: z.literal("skipForward"), seconds: z.number().positive().optional() }),
  z.object({ command: z.literal("skipBackward"), seconds: z.number().positive().optional() }),
  z.object({ command: z.literal("seekTo"), position: z.number().nonnegative() }),
]);

type CommandBody = z.infer<typeof CommandSchema>;

function toTransportCommand(body: CommandBody): TransportCommand {
  switch (body.command) {
    case "skipForward":
      return { type: "skipForward", seconds: body.seconds };
    case "skipBackward":
      return { type: "skipBackward", seconds: body.seconds };
    case "seekTo":
      return { type: "seekTo", position: body.position };
    default:
      return { type: body.command };
  }
}

export interface HttpTransportSurfaceOptions {
  logger?: Logger;
}

/**
 * Remote controls over HTTP: the latest now-playing snapshot is readable at
 * GET /now-playing and commands arrive at POST /commands.
 *
 * Optional adapter. No port is opened until the host application calls
 * `listen`; until then the routes are reachable only through `app.inject`.
 */
export class HttpTransportSurface implements RemoteTransportSurface {
  readonly app: FastifyInstance;
  private readonly log: Logger;
  private handler: TransportCommandHandler | null = null;
  private current: NowPlayingInfo = {
    title: NOW_PLAYING_FALLBACK_TITLE,
    elapsed: 0,
    duration: 0,
    rate: 0,
  };

  constructor(opts: HttpTransportSurfaceOptions = {}) {
    this.log = componentLogger("remote-control", opts.logger);
    this.app = Fastify({ logger: false });
    this.registerRoutes();
  }

  publish(info: NowPlayingInfo): void {
    this.current = { ...info };
  }

  onCommand(handler: TransportCommandHandler): Unsubscribe {
    this.handler = handler;
    return () => {
      if (this.handler === handler) this.handler = null;
    };
  }

  get nowPlaying(): NowPlayingInfo {
    return { ...this.current };
  }

  async listen(port: number, host: string): Promise<string> {
    const address = await this.app.listen({ port, host });
    this.log.info(`remote control listening on ${address}`);
    return address;
  }

  close(): Promise<void> {
    return this.app.close();
  }

  private registerRoutes(): void {
    this.app.get("/healthz", async () => ({ ok: true }));

    this.app.get("/now-playing", async () => this.nowPlaying);

    this.app.post("/commands", async (req, reply) => {
      const parsed = CommandSchema.safeParse(req.body);
      if (!parsed.success) {
        return reply.code(400).send({ error: parsed.error.issues });
      }
      if (!this.handler) {
        return reply.code(503).send({ error: "No player attached" });
      }
      const command = toTransportCommand(parsed.data);
      const handled = this.handler(command);
      this.log.info({ command, handled }, "remote command");
      if (!handled) {
        return reply.code(409).send({ error: "Nothing is loaded" });
      }
      return reply.code(202).send({ accepted: true });
    });
  }
}

import type { Unsubscribe } from "../types.js";

export interface NowPlayingInfo {
  title: string;
  elapsed: number;
  duration: number;
  rate: number; // 1 while playing, 0 otherwise
}

export type TransportCommand =
  | { type: "play" }
  | { type: "pause" }
  | { type: "togglePlayPause" }
  | { type: "skipForward"; seconds?: number }
  | { type: "skipBackward"; seconds?: number }
  | { type: "seekTo"; position: number };

/** Returns false when there was nothing to act on. */
export type TransportCommandHandler = (command: TransportCommand) => boolean;

/** Lock-screen style controls: receives now-playing snapshots, emits commands. */
export interface RemoteTransportSurface {
  publish(info: NowPlayingInfo): void;
  onCommand(handler: TransportCommandHandler): Unsubscribe;
}

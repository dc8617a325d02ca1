export { GameSession } from "./session.js";
export type { GameSessionConfig, RecordSink } from "./session.js";
export { runPlay } from "./play-loop.js";
export type { RunPlayOptions } from "./play-loop.js";
export { InMemoryArena } from "./in-memory-arena.js";
export type { ArenaStep, ArenaScript, ArenaInstanceView, InMemoryArenaConfig } from "./in-memory-arena.js";

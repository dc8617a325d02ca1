import { readdir } from "node:fs/promises";
import { basename } from "node:path";
import { ValidationError } from "@gridswarm/schemas";

export const RECORDING_SUFFIX = ".recording.jsonl";

export interface RecordingName {
  game_id: string;
  policy: string;
  max_actions: number;
  instance_id: string;
}

const SEGMENT = /^[^./\\]+$/;

/** `{game_id}.{policy}.{max_actions}.{instance_id}.recording.jsonl` */
export function recordingFileName(name: RecordingName): string {
  if (!SEGMENT.test(name.game_id)) {
    throw new ValidationError(`game id "${name.game_id}" cannot be used in a recording name`);
  }
  if (!SEGMENT.test(name.instance_id)) {
    throw new ValidationError(`instance id "${name.instance_id}" cannot be used in a recording name`);
  }
  if (name.policy === "" || /[/\\]/.test(name.policy)) {
    throw new ValidationError(`policy name "${name.policy}" cannot be used in a recording name`);
  }
  return `${name.game_id}.${name.policy}.${name.max_actions}.${name.instance_id}${RECORDING_SUFFIX}`;
}

export function isRecordingFileName(fileName: string): boolean {
  return parseRecordingFileName(fileName) !== null;
}

/**
 * Split a recording file name back into its parts. The game id is the first
 * segment and the instance id the last; the policy name may itself contain dots.
 */
export function parseRecordingFileName(fileName: string): RecordingName | null {
  const base = basename(fileName);
  if (!base.endsWith(RECORDING_SUFFIX)) return null;
  const parts = base.slice(0, -RECORDING_SUFFIX.length).split(".");
  if (parts.length < 4) return null;
  const gameId = parts[0];
  const instanceId = parts[parts.length - 1];
  const maxActions = Number(parts[parts.length - 2]);
  const policy = parts.slice(1, -2).join(".");
  if (!gameId || !instanceId || !policy || !Number.isInteger(maxActions) || maxActions < 1) return null;
  return { game_id: gameId, policy, max_actions: maxActions, instance_id: instanceId };
}

/** Recording file names in `dir`, sorted. A missing directory has none. */
export async function listRecordings(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }
  return entries.filter(isRecordingFileName).sort();
}

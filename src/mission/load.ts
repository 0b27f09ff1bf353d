import fs from 'fs';
import { formatIssues } from '../config/env';
import { MissionConfigError, RoverSimErrorCode } from '../errors';
import { MissionSchema, type Mission } from './types';

export const parseMission = (input: unknown): Mission => {
  const result = MissionSchema.safeParse(input);
  if (!result.success) {
    throw new MissionConfigError(RoverSimErrorCode.MISSION_INVALID, formatIssues(result.error.issues));
  }
  return result.data;
};

export const loadMission = (filePath: string): Mission => {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MissionConfigError(RoverSimErrorCode.MISSION_UNREADABLE, [message], { filePath });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MissionConfigError(RoverSimErrorCode.MISSION_UNREADABLE, [`invalid JSON: ${message}`], {
      filePath,
    });
  }

  return parseMission(json);
};

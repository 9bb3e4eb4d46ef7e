import { z } from 'zod';
import type { MotorSettings } from '../types';
import { MotorSettingsSchema } from './settings';
import { isSeriesKey, type SeriesKey } from './chartSeries';

export const PROJECT_KEY_PREFIX = 'motor_proj_';

export interface SavedProject {
  settings: MotorSettings;
  visibleSeries: SeriesKey[];
  timestamp: number;
}

export type ProjectStore = Pick<Storage, 'getItem' | 'setItem' | 'key' | 'length'>;

const SavedProjectSchema = z.object({
  settings: MotorSettingsSchema,
  visibleSeries: z.array(z.string()).transform((keys) => keys.filter(isSeriesKey)),
  timestamp: z.number(),
});

export const listSavedProjects = (store: ProjectStore): string[] => {
  const names: string[] = [];
  for (let i = 0; i < store.length; i++) {
    const key = store.key(i);
    if (key && key.startsWith(PROJECT_KEY_PREFIX)) {
      names.push(key.slice(PROJECT_KEY_PREFIX.length));
    }
  }
  return names.sort();
};

/** Throws when the store rejects the write (e.g. quota exceeded). */
export const saveProject = (store: ProjectStore, name: string, project: SavedProject): void => {
  store.setItem(`${PROJECT_KEY_PREFIX}${name}`, JSON.stringify(project));
};

/**
 * Returns null when the project does not exist or its stored data no longer
 * matches the settings schema.
 */
export const loadProject = (store: ProjectStore, name: string): SavedProject | null => {
  const item = store.getItem(`${PROJECT_KEY_PREFIX}${name}`);
  if (item === null) return null;

  try {
    const parsed = SavedProjectSchema.safeParse(JSON.parse(item));
    if (!parsed.success) {
      console.error(`Saved project "${name}" is invalid`, parsed.error.issues);
      return null;
    }
    return parsed.data;
  } catch (error) {
    console.error(`Error reading project "${name}"`, error);
    return null;
  }
};

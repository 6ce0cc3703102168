import levelsJson from "./levels.json";
import type { LevelData } from "@/types/puzzle";

const levels: LevelData[] = levelsJson;

export const loadLevels = () => levels;

export const getLevelById = (id: string) =>
  levels.find((level) => level.id === id) ?? levels[0];

export const hasLevel = (id: string) => levels.some((level) => level.id === id);

import fs from "fs";
import path from "path";
import { errorMessage, isRecord } from "./utils/guards.js";

/**
 * 에이전트 캐릭터 (역할 설명자)
 *
 * 모든 생성 프롬프트 앞에 붙는 이름/설명/행동 지침.
 */
export interface Character {
  name: string;
  description: string;
  instructions: string;
  username?: string;
}

export function parseCharacter(raw: unknown, source: string = "character"): Character {
  if (!isRecord(raw)) {
    throw new Error(`${source}: expected a JSON object`);
  }
  const name = readRequiredString(raw, "name", source);
  const description = readRequiredString(raw, "description", source);
  const instructions = readRequiredString(raw, "instructions", source);
  const username = typeof raw.username === "string" && raw.username.trim()
    ? raw.username.trim().replace(/^@/, "")
    : undefined;

  return { name, description, instructions, ...(username ? { username } : {}) };
}

// 캐릭터 설정 파일 로드 (상대 경로는 cwd 기준)
export function loadCharacter(characterFile: string): Character {
  const targetPath = path.isAbsolute(characterFile)
    ? characterFile
    : path.join(process.cwd(), characterFile);

  let raw: string;
  try {
    raw = fs.readFileSync(targetPath, "utf-8");
  } catch (error) {
    throw new Error(`Failed to read character file ${targetPath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Character file ${targetPath} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseCharacter(parsed, targetPath);
}

function readRequiredString(record: Record<string, unknown>, key: string, source: string): string {
  const value = record[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new Error(`${source}: "${key}" must be a non-empty string`);
  }
  return value.trim();
}

import fs from 'fs';
import path from 'path';

/** Audio file name for a vocabulary index: 7 -> "007.mp3" */
export function audioFileName(index: number): string {
  return `${String(index).padStart(3, '0')}.mp3`;
}

export function audioPath(audioDir: string, index: number): string {
  return path.join(audioDir, audioFileName(index));
}

export function hasAudio(audioDir: string, index: number): boolean {
  return fs.existsSync(audioPath(audioDir, index));
}

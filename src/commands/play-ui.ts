import { ActionRowBuilder, ButtonBuilder, ButtonStyle } from 'discord.js';
import { CandidateTrack, Track } from '../music/types';

const MAX_TITLE_LENGTH = 70;
const MAX_CHOICE_BUTTONS = 5;
const CHOICE_ID_PREFIX = 'pick_';

export function truncateTitle(title: string): string {
  return title.length <= MAX_TITLE_LENGTH ? title : `${title.slice(0, MAX_TITLE_LENGTH - 3)}...`;
}

export function formatDuration(seconds: number | undefined): string {
  if (seconds === undefined) return '';
  const total = Math.floor(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  if (hours > 0) {
    return `${hours}:${minutes.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
  }
  return `${minutes}:${secs.toString().padStart(2, '0')}`;
}

export function formatCandidateList(candidates: readonly CandidateTrack[]): string {
  const lines = ['Search results (press a button or use choose <number>):'];
  candidates.forEach((candidate, index) => {
    const extra = [candidate.channel, formatDuration(candidate.duration)].filter(Boolean);
    const suffix = extra.length > 0 ? ` — ${extra.join(' • ')}` : '';
    lines.push(`${index + 1}. ${truncateTitle(candidate.title)}${suffix}`);
  });
  return lines.join('\n');
}

export function formatQueue(tracks: readonly Track[]): string {
  if (tracks.length === 0) return 'The queue is empty.';
  const lines = tracks.map((track, index) => `${index + 1}. ${truncateTitle(track.title)}`);
  return `Queue:\n${lines.join('\n')}`;
}

export function createChoiceButtons(count: number): ActionRowBuilder<ButtonBuilder> {
  const row = new ActionRowBuilder<ButtonBuilder>();
  for (let i = 1; i <= Math.min(MAX_CHOICE_BUTTONS, count); i++) {
    row.addComponents(
      new ButtonBuilder()
        .setCustomId(`${CHOICE_ID_PREFIX}${i}`)
        .setLabel(String(i))
        .setStyle(ButtonStyle.Primary)
    );
  }
  return row;
}

/** `pick_3` → 3; anything else → null. */
export function parseChoiceId(customId: string): number | null {
  if (!customId.startsWith(CHOICE_ID_PREFIX)) return null;
  const index = Number.parseInt(customId.slice(CHOICE_ID_PREFIX.length), 10);
  return Number.isInteger(index) && index > 0 ? index : null;
}

import { InvalidSelectionError, SelectionInProgressError } from './errors';
import { EnqueueResult, PlaybackController } from './playback';
import { GuildState } from './queue';
import { CandidateTrack, MediaResolver } from './types';

/**
 * Search-then-choose: `search` stores a guild-wide candidate list, `select`
 * resolves one entry of the stored list and enqueues it.
 */
export class SearchSelectionFlow {
  private readonly resolver: MediaResolver;
  private readonly playback: PlaybackController;
  private readonly resultCount: number;

  constructor(resolver: MediaResolver, playback: PlaybackController, resultCount: number) {
    this.resolver = resolver;
    this.playback = playback;
    this.resultCount = resultCount;
  }

  async search(state: GuildState, query: string): Promise<readonly CandidateTrack[]> {
    const candidates = await this.resolver.searchFlat(query, this.resultCount);
    state.pendingCandidates = Object.freeze(candidates.slice(0, this.resultCount));
    console.log(`[search] Stored ${state.pendingCandidates.length} candidates guild=${state.guildId}`);
    return state.pendingCandidates;
  }

  /**
   * Resolves candidate `index` (1-based) of the current list and enqueues it.
   * `beforeResolve` runs after the index is validated and before the slow
   * resolution, e.g. to join a voice channel. When `expected` is given the
   * choice is refused unless it is still the current list.
   */
  async select(
    state: GuildState,
    index: number,
    beforeResolve?: () => Promise<void>,
    expected?: readonly CandidateTrack[]
  ): Promise<EnqueueResult> {
    if (state.chooseInFlight) {
      throw new SelectionInProgressError();
    }
    state.chooseInFlight = true;

    try {
      const candidates = state.pendingCandidates;
      if (!candidates || candidates.length === 0) {
        throw new InvalidSelectionError('There are no search results to choose from. Search again with play <query>.');
      }
      if (expected && expected !== candidates) {
        throw new InvalidSelectionError('Those search results are out of date. Use the buttons on the latest search.');
      }
      if (!Number.isInteger(index) || index < 1 || index > candidates.length) {
        throw new InvalidSelectionError(`Choose a number between 1 and ${candidates.length}.`);
      }

      await beforeResolve?.();

      const candidate = candidates[index - 1];
      console.log(`[search] Resolving choice ${index} guild=${state.guildId} page=${candidate.pageUrl}`);
      const track = await this.resolver.resolveOne(candidate.pageUrl);

      const result = await this.playback.enqueueAndMaybeStart(state, track);
      // A newer search may have replaced the list while resolving; keep that one.
      if (state.pendingCandidates === candidates) {
        state.pendingCandidates = null;
      }
      return result;
    } finally {
      state.chooseInFlight = false;
    }
  }
}

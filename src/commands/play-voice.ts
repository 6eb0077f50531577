import { ChannelType, Client, GuildBasedChannel, PermissionFlagsBits, TextChannel } from 'discord.js';
import {
  AudioPlayer,
  AudioPlayerStatus,
  DiscordGatewayAdapterCreator,
  StreamType,
  VoiceConnection,
  VoiceConnectionStatus,
  createAudioPlayer,
  createAudioResource,
  entersState,
  joinVoiceChannel,
} from '@discordjs/voice';
import { ChannelMember, Notifier, PlaybackCompletion, VoiceSession } from '../music/types';
import { createFfmpegStream, logStreamIssue } from './play-streams';

const READY_TIMEOUT_MS = 20_000;
const RECONNECT_WINDOW_MS = 5_000;

/** The bot's voice presence in one guild, backed by @discordjs/voice. */
export class DiscordVoiceSession implements VoiceSession {
  private readonly client: Client;
  private readonly guildId: string;
  private readonly player: AudioPlayer;
  private connection: VoiceConnection | null = null;
  private onComplete: PlaybackCompletion | null = null;
  private streamError: Error | undefined;

  constructor(client: Client, guildId: string) {
    this.client = client;
    this.guildId = guildId;
    this.player = createAudioPlayer();

    this.player.on('error', (error) => {
      this.streamError = error;
      logStreamIssue(`[voice] Audio player error guild=${guildId}`, error);
    });

    this.player.on('stateChange', (oldState, newState) => {
      if (newState.status === AudioPlayerStatus.Idle && oldState.status !== AudioPlayerStatus.Idle) {
        this.finish();
      }
    });
  }

  async connect(channelId: string): Promise<void> {
    const guild = this.client.guilds.cache.get(this.guildId);
    if (!guild) {
      throw new Error(`Guild ${this.guildId} is not available`);
    }

    const connection = joinVoiceChannel({
      channelId,
      guildId: this.guildId,
      adapterCreator: guild.voiceAdapterCreator as DiscordGatewayAdapterCreator,
      selfDeaf: true,
    });
    // joinVoiceChannel hands back the live connection when one exists.
    const fresh = connection !== this.connection;
    this.connection = connection;

    if (fresh) {
      this.watchConnection(connection);
    }

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, READY_TIMEOUT_MS);
    } catch (error) {
      if (connection.state.status !== VoiceConnectionStatus.Destroyed) {
        connection.destroy();
      }
      throw error;
    }
  }

  private watchConnection(connection: VoiceConnection): void {
    connection.on('stateChange', (oldState, newState) => {
      console.log(`[voice] Connection guild=${this.guildId} ${oldState.status} -> ${newState.status}`);
      if (newState.status === VoiceConnectionStatus.Destroyed && this.connection === connection) {
        this.connection = null;
      }
    });

    connection.on(VoiceConnectionStatus.Disconnected, () => {
      Promise.race([
        entersState(connection, VoiceConnectionStatus.Signalling, RECONNECT_WINDOW_MS),
        entersState(connection, VoiceConnectionStatus.Connecting, RECONNECT_WINDOW_MS),
      ]).catch(() => {
        if (connection.state.status !== VoiceConnectionStatus.Destroyed) {
          connection.destroy();
        }
      });
    });

    connection.on('error', (error) => {
      console.error(`[voice] Connection error guild=${this.guildId}:`, error);
    });

    connection.subscribe(this.player);
  }

  disconnect(): void {
    this.player.stop(true);
    const connection = this.connection;
    this.connection = null;
    if (connection && connection.state.status !== VoiceConnectionStatus.Destroyed) {
      connection.destroy();
    }
  }

  play(streamUrl: string, onComplete: PlaybackCompletion): void {
    this.onComplete = onComplete;
    this.streamError = undefined;
    const resource = createAudioResource(createFfmpegStream(streamUrl), { inputType: StreamType.Raw });
    this.player.play(resource);
  }

  pause(): boolean {
    return this.player.pause();
  }

  resume(): boolean {
    return this.player.unpause();
  }

  stop(): void {
    this.player.stop(true);
  }

  isPlaying(): boolean {
    const status = this.player.state.status;
    return status === AudioPlayerStatus.Playing || status === AudioPlayerStatus.Buffering;
  }

  isPaused(): boolean {
    const status = this.player.state.status;
    return status === AudioPlayerStatus.Paused || status === AudioPlayerStatus.AutoPaused;
  }

  isConnected(): boolean {
    const status = this.connection?.state.status;
    return status !== undefined
      && status !== VoiceConnectionStatus.Destroyed
      && status !== VoiceConnectionStatus.Disconnected;
  }

  currentChannelMembers(): ChannelMember[] {
    const channelId = this.connection?.joinConfig.channelId;
    if (!channelId) return [];
    const channel = this.client.guilds.cache.get(this.guildId)?.channels.cache.get(channelId);
    if (!channel?.isVoiceBased()) return [];
    return channel.members.map((member) => ({ id: member.id, bot: member.user.bot }));
  }

  private finish(): void {
    const callback = this.onComplete;
    const error = this.streamError;
    this.onComplete = null;
    this.streamError = undefined;
    callback?.(error);
  }
}

type Sendable = { send(text: string): Promise<unknown> };

/**
 * Sends guild notices to the remembered text channel, else the system channel,
 * else the first text channel (by position) the bot may write in.
 */
export class DiscordNotifier implements Notifier {
  private readonly client: Client;

  constructor(client: Client) {
    this.client = client;
  }

  async send(guildId: string, channelId: string | null, text: string): Promise<void> {
    const channel = this.resolveChannel(guildId, channelId);
    if (!channel) {
      console.warn(`[notify] No channel to write to guild=${guildId}`);
      return;
    }
    try {
      await channel.send(text);
    } catch (error) {
      console.warn(`[notify] Send failed guild=${guildId}:`, error);
    }
  }

  private resolveChannel(guildId: string, channelId: string | null): Sendable | null {
    const guild = this.client.guilds.cache.get(guildId);
    if (!guild) return null;
    const me = guild.members.me;
    const canWrite = (channel: GuildBasedChannel): boolean =>
      !me || me.permissionsIn(channel).has(PermissionFlagsBits.SendMessages);

    if (channelId) {
      const remembered = guild.channels.cache.get(channelId);
      if (remembered?.isSendable() && canWrite(remembered)) return remembered;
    }
    if (guild.systemChannel && canWrite(guild.systemChannel)) return guild.systemChannel;

    const textChannels = [...guild.channels.cache.values()]
      .filter((channel): channel is TextChannel => channel.type === ChannelType.GuildText)
      .sort((a, b) => a.position - b.position);
    return textChannels.find(canWrite) ?? null;
  }
}

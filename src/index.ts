import { Client, GatewayIntentBits } from 'discord.js';
import { config } from 'dotenv';
import { MusicCommands } from './commands/play';
import { messageContext } from './commands/play-context';
import { DiscordNotifier, DiscordVoiceSession } from './commands/play-voice';
import { dispatchCommand, parseCommand } from './commands/router';
import {
  chooseButtonTimeoutMs,
  commandPrefix,
  discordToken,
  idleLeaveDelays,
  searchResultCount,
} from './config';
import { IdleLeaveScheduler } from './music/idle-leave';
import { PlaybackController } from './music/playback';
import { PresenceTracker } from './music/presence';
import { YtDlpResolver } from './music/search';
import { SearchSelectionFlow } from './music/selection';
import { StateRegistry } from './music/state';

config();

const token = discordToken();
if (!token) {
  console.error('DISCORD_TOKEN is not set. Add it to .env or the environment.');
  process.exit(1);
}

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.GuildVoiceStates,
    GatewayIntentBits.MessageContent,
  ],
});

const delays = idleLeaveDelays();
const prefix = commandPrefix();
const notifier = new DiscordNotifier(client);
const idleLeave = new IdleLeaveScheduler(notifier);
const registry = new StateRegistry((guildId) => new DiscordVoiceSession(client, guildId));
const resolver = new YtDlpResolver();
const playback = new PlaybackController(idleLeave, notifier, delays);
const selection = new SearchSelectionFlow(resolver, playback, searchResultCount());
const commands = new MusicCommands(registry, resolver, playback, selection);
const presence = new PresenceTracker(registry, idleLeave, delays.membershipMs);
const choiceTimeoutMs = chooseButtonTimeoutMs();

client.once('ready', (readyClient) => {
  console.log(`Bot is ready as ${readyClient.user.tag} (prefix "${prefix}")`);
});

client.on('messageCreate', async (message) => {
  if (message.author.bot || !message.inGuild()) return;

  const command = parseCommand(message.content, prefix);
  if (!command) return;

  try {
    await dispatchCommand(commands, messageContext(message, { commands, choiceTimeoutMs }), command);
  } catch (error) {
    console.error(`[command] ${command.name} crashed guild=${message.guildId}:`, error);
  }
});

client.on('voiceStateUpdate', (oldState, newState) => {
  presence.onVoiceStateChange({
    guildId: newState.guild.id,
    oldChannelId: oldState.channelId,
    newChannelId: newState.channelId,
    botChannelId: newState.guild.members.me?.voice.channelId ?? null,
  });
});

client.on('guildDelete', (guild) => {
  presence.onGuildRemoved(guild.id);
});

client.login(token).catch((error) => {
  console.error('Login failed:', error);
  process.exit(1);
});

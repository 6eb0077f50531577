import { ButtonInteraction, ComponentType, Message } from 'discord.js';
import { CandidateTrack } from '../music/types';
import { CommandContext, MusicCommands } from './play';
import { createChoiceButtons, parseChoiceId } from './play-ui';

export interface ContextOptions {
  commands: MusicCommands;
  choiceTimeoutMs: number;
}

export function messageContext(message: Message<true>, options: ContextOptions): CommandContext {
  return {
    guildId: message.guildId,
    authorId: message.author.id,
    channelId: message.channelId,
    authorVoiceChannelId: message.member?.voice.channelId ?? null,
    attachments: message.attachments.map((attachment) => ({ url: attachment.url, name: attachment.name })),
    reply: async (text) => {
      await message.reply(text);
    },
    presentChoices: async (text, candidates) => {
      const sent = await message.reply({ content: text, components: [createChoiceButtons(candidates.length)] });
      watchChoiceButtons(sent, message.guildId, options, candidates);
    },
  };
}

function buttonContext(interaction: ButtonInteraction, guildId: string): CommandContext {
  const member = interaction.guild?.members.cache.get(interaction.user.id);
  const followUp = async (text: string): Promise<void> => {
    await interaction.followUp(text);
  };
  return {
    guildId,
    authorId: interaction.user.id,
    channelId: interaction.message.channelId,
    authorVoiceChannelId: member?.voice.channelId ?? null,
    attachments: [],
    reply: followUp,
    presentChoices: followUp,
  };
}

/** Routes button presses on a search reply into `choose`; strips the buttons once done. */
function watchChoiceButtons(
  sent: Message<true>,
  guildId: string,
  options: ContextOptions,
  candidates: readonly CandidateTrack[]
): void {
  const collector = sent.createMessageComponentCollector({
    componentType: ComponentType.Button,
    time: options.choiceTimeoutMs,
  });

  collector.on('collect', (interaction) => {
    const index = parseChoiceId(interaction.customId);
    if (index === null) return;

    (async () => {
      await interaction.deferUpdate();
      const queued = await options.commands.handleChoose(buttonContext(interaction, guildId), index, candidates);
      if (queued) collector.stop('chosen');
    })().catch((error) => {
      console.error(`[command] choice button failed guild=${guildId}:`, error);
    });
  });

  collector.on('end', (_collected, reason) => {
    console.log(`[search] Choice buttons closed guild=${guildId} reason=${reason}`);
    sent.edit({ components: [] }).catch((error) => {
      console.warn(`[search] Could not remove choice buttons guild=${guildId}:`, error);
    });
  });
}

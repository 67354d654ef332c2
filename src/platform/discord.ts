/**
 * WhosOn — Discord Platform
 *
 * Resource-management capability backed by discord.js. Scopes are guilds,
 * containers are categories, status resources are voice channels and detail
 * resources are text channels holding one embed.
 */

import {
  ChannelType,
  EmbedBuilder,
  GatewayIntentBits,
  OverwriteType,
  type PermissionsBitField,
  type Client,
  type ClientOptions,
  type Guild,
  type GuildBasedChannel,
  type GuildTextBasedChannel,
  type PermissionOverwriteOptions,
  type PermissionsString,
} from "discord.js";

import { TrackerFault, classifyFault } from "../errors.js";
import {
  CAPABILITIES,
  type Capability,
  type CreateDetailResourceOptions,
  type CreateStatusResourceOptions,
  type ResourcePlatform,
  type StructuredReport,
} from "../types.js";

// =============================================================================
// Capability Mapping
// =============================================================================

export const CAPABILITY_PERMISSIONS = {
  manage_resources: "ManageChannels",
  manage_grants: "ManageRoles",
  view: "ViewChannel",
  connect: "Connect",
  send_messages: "SendMessages",
  embed_links: "EmbedLinks",
  read_history: "ReadMessageHistory",
  manage_messages: "ManageMessages",
} as const satisfies Record<Capability, PermissionsString>;

const STATUS_GRANTS: PermissionsString[] = ["ManageChannels", "ViewChannel", "Connect"];
const DETAIL_GRANTS: PermissionsString[] = [
  "ViewChannel",
  "SendMessages",
  "EmbedLinks",
  "ReadMessageHistory",
  "ManageMessages",
];

export function capabilitiesFrom(permissions: Readonly<PermissionsBitField>): Set<Capability> {
  return new Set(CAPABILITIES.filter((c) => permissions.has(CAPABILITY_PERMISSIONS[c])));
}

export function toPermissionOverwrite(capabilities: readonly Capability[]): PermissionOverwriteOptions {
  const options: PermissionOverwriteOptions = {};
  for (const c of capabilities) options[CAPABILITY_PERMISSIONS[c]] = true;
  return options;
}

// =============================================================================
// Client Options
// =============================================================================

/**
 * Route prefixes where a 429 rejects with a `RateLimitError` instead of being
 * queued. Renames allow two edits per ten minutes; waiting them out would
 * stall the whole update cycle.
 */
export const REJECT_ON_RATE_LIMIT_ROUTES: string[] = ["/channels"];

export function discordClientOptions(): ClientOptions {
  return {
    intents: [GatewayIntentBits.Guilds],
    rest: { rejectOnRateLimit: REJECT_ON_RATE_LIMIT_ROUTES },
  };
}

// =============================================================================
// Embeds
// =============================================================================

export function toEmbed(report: StructuredReport, timestamp: Date = new Date()): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(report.title)
    .setColor(report.color)
    .setFooter({ text: report.footer })
    .setTimestamp(timestamp);
  if (report.description) embed.setDescription(report.description);
  if (report.fields.length > 0) embed.addFields(report.fields);
  return embed;
}

// =============================================================================
// Platform
// =============================================================================

export class DiscordPlatform implements ResourcePlatform {
  private readonly client: Client<true>;

  constructor(client: Client<true>) {
    this.client = client;
  }

  get principalId(): string {
    return this.client.user.id;
  }

  async listScopes(): Promise<string[]> {
    return [...this.client.guilds.cache.keys()];
  }

  async findContainer(scopeId: string, name: string): Promise<string | undefined> {
    const channels = await (await this.guild(scopeId)).channels.fetch();
    return channels.find((c) => c?.type === ChannelType.GuildCategory && c.name === name)?.id;
  }

  async createContainer(scopeId: string, name: string): Promise<string> {
    const guild = await this.guild(scopeId);
    const category = await guild.channels.create({ name, type: ChannelType.GuildCategory });
    return category.id;
  }

  async deleteContainer(scopeId: string, containerRef: string): Promise<void> {
    await (await this.guild(scopeId)).channels.delete(containerRef);
  }

  async countContainerChildren(scopeId: string, containerRef: string): Promise<number> {
    const channels = await (await this.guild(scopeId)).channels.fetch();
    return channels.filter((c) => c?.parentId === containerRef).size;
  }

  async createStatusResource(scopeId: string, options: CreateStatusResourceOptions): Promise<string> {
    const guild = await this.guild(scopeId);
    const channel = await guild.channels.create({
      name: options.name,
      type: ChannelType.GuildVoice,
      parent: options.containerRef,
      userLimit: options.occupancyCap,
      permissionOverwrites: [
        { id: guild.roles.everyone.id, type: OverwriteType.Role, deny: ["Connect"] },
        { id: this.principalId, type: OverwriteType.Member, allow: STATUS_GRANTS },
      ],
    });
    return channel.id;
  }

  async createDetailResource(scopeId: string, options: CreateDetailResourceOptions): Promise<string> {
    const guild = await this.guild(scopeId);
    const channel = await guild.channels.create({
      name: options.name,
      type: ChannelType.GuildText,
      parent: options.containerRef,
      topic: options.topic,
      permissionOverwrites: [
        {
          id: guild.roles.everyone.id,
          type: OverwriteType.Role,
          allow: ["ViewChannel", "ReadMessageHistory"],
          deny: ["SendMessages", "AddReactions"],
        },
        { id: this.principalId, type: OverwriteType.Member, allow: DETAIL_GRANTS },
      ],
    });
    return channel.id;
  }

  async getResourceName(scopeId: string, resourceRef: string): Promise<string | undefined> {
    return (await this.findChannel(scopeId, resourceRef))?.name;
  }

  async getResourceContainer(scopeId: string, resourceRef: string): Promise<string | undefined> {
    return (await this.findChannel(scopeId, resourceRef))?.parentId ?? undefined;
  }

  async renameResource(scopeId: string, resourceRef: string, name: string): Promise<void> {
    await (await this.guild(scopeId)).channels.edit(resourceRef, { name });
  }

  async deleteResource(scopeId: string, resourceRef: string): Promise<void> {
    await (await this.guild(scopeId)).channels.delete(resourceRef);
  }

  async sendMessage(scopeId: string, resourceRef: string, report: StructuredReport): Promise<string> {
    const channel = await this.textChannel(scopeId, resourceRef);
    const message = await channel.send({ embeds: [toEmbed(report)] });
    return message.id;
  }

  async editMessage(scopeId: string, resourceRef: string, messageRef: string, report: StructuredReport): Promise<void> {
    const channel = await this.textChannel(scopeId, resourceRef);
    await channel.messages.edit(messageRef, { embeds: [toEmbed(report)] });
  }

  async getScopeCapabilities(scopeId: string): Promise<ReadonlySet<Capability>> {
    const me = await (await this.guild(scopeId)).members.fetchMe();
    return capabilitiesFrom(me.permissions);
  }

  async getGrantedCapabilities(scopeId: string, resourceRef: string, principalId: string): Promise<ReadonlySet<Capability>> {
    const guild = await this.guild(scopeId);
    const channel = await this.channel(scopeId, resourceRef);
    const member = await guild.members.fetch(principalId);
    return capabilitiesFrom(member.permissionsIn(channel));
  }

  async grantCapabilities(
    scopeId: string,
    resourceRef: string,
    principalId: string,
    capabilities: readonly Capability[],
  ): Promise<void> {
    const channel = await this.channel(scopeId, resourceRef);
    if (channel.isThread()) {
      throw new TrackerFault("unexpected", `Channel ${resourceRef} is a thread and has no permission overwrites`);
    }
    await channel.permissionOverwrites.edit(principalId, toPermissionOverwrite(capabilities), {
      type: OverwriteType.Member,
    });
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private async guild(scopeId: string): Promise<Guild> {
    return this.client.guilds.fetch(scopeId);
  }

  private async channel(scopeId: string, ref: string): Promise<GuildBasedChannel> {
    const channel = await (await this.guild(scopeId)).channels.fetch(ref);
    if (!channel) throw new TrackerFault("not_found", `Unknown channel ${ref}`);
    return channel;
  }

  private async findChannel(scopeId: string, ref: string): Promise<GuildBasedChannel | undefined> {
    try {
      return await this.channel(scopeId, ref);
    } catch (err) {
      if (classifyFault(err) === "not_found") return undefined;
      throw err;
    }
  }

  private async textChannel(scopeId: string, ref: string): Promise<GuildTextBasedChannel> {
    const channel = await this.channel(scopeId, ref);
    if (!channel.isTextBased()) {
      throw new TrackerFault("not_found", `Channel ${ref} cannot hold messages`);
    }
    return channel;
  }
}

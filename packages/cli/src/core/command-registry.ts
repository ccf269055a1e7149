/**
 * Command Registry - Command groups known to the CLI
 */

import type { CommandDefinition, CommandGroup } from '../types/index.js';
import { ConfigurationError, NotFoundError } from '@modelvault/utils';

export class CommandRegistry {
  private groups: Map<string, CommandGroup> = new Map();
  private commands: Map<string, CommandDefinition> = new Map();

  /**
   * Register a command group and all its commands
   */
  registerGroup(group: CommandGroup): void {
    if (this.groups.has(group.groupName)) {
      throw new ConfigurationError(`Command group ${group.groupName} is already registered`, 'groupName', {
        groupName: group.groupName,
      });
    }

    for (const command of group.commands) {
      const fullName = `${group.groupName}.${command.name}`;
      if (this.commands.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          groupName: group.groupName,
          commandName: command.name,
        });
      }
      this.commands.set(fullName, command);
    }
    this.groups.set(group.groupName, group);
  }

  getCommand(groupName: string, commandName: string): CommandDefinition | undefined {
    return this.commands.get(`${groupName}.${commandName}`);
  }

  /**
   * Like getCommand, for callers that cannot go on without the command
   */
  requireCommand(groupName: string, commandName: string): CommandDefinition {
    const command = this.getCommand(groupName, commandName);
    if (!command) {
      throw new NotFoundError('Command', `${groupName} ${commandName}`);
    }
    return command;
  }

  getGroups(): CommandGroup[] {
    return Array.from(this.groups.values());
  }

  /**
   * Help text for one group, with its examples
   */
  generateGroupHelp(groupName: string): string {
    const group = this.groups.get(groupName);
    if (!group) {
      return `Command group ${groupName} not found`;
    }

    const lines: string[] = [group.description, '', 'Commands:'];
    for (const command of group.commands) {
      lines.push(`  ${command.name.padEnd(20)} ${command.description}`);
      for (const example of command.examples ?? []) {
        lines.push(`    Example: ${example}`);
      }
    }
    return lines.join('\n');
  }
}

/**
 * Global command registry instance
 */
export const commandRegistry = new CommandRegistry();

import type { Command } from 'commander';
import { ServerCommand } from './server-command';
import type { DependencyInjectionService } from '../../services/dependency-injection';

export function registerServerCommands(program: Command, di: DependencyInjectionService): void {
  new ServerCommand(di).register(program);
}

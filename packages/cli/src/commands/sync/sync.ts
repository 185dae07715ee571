import type { Command } from 'commander';
import { SyncCommand } from './sync-command';
import type { DependencyInjectionService } from '../../services/dependency-injection';

export function registerSyncCommands(program: Command, di: DependencyInjectionService): void {
  new SyncCommand(di).register(program);
}

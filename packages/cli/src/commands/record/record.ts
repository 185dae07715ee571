import type { Command } from 'commander';
import { RecordCommand } from './record-command';
import type { DependencyInjectionService } from '../../services/dependency-injection';

/**
 * Registers new, list, show, update, done and archive as top-level commands.
 */
export function registerRecordCommands(program: Command, di: DependencyInjectionService): void {
  new RecordCommand(di).register(program);
}

import type { Command } from 'commander';
import { WorkstreamCommand } from './workstream-command';
import type { DependencyInjectionService } from '../../services/dependency-injection';

export function registerWorkstreamCommands(program: Command, di: DependencyInjectionService): void {
  new WorkstreamCommand(di).register(program);
}

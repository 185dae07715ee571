import type { Command } from 'commander';
import { BoardCommand } from './board-command';
import type { DependencyInjectionService } from '../../services/dependency-injection';

export function registerBoardCommands(program: Command, di: DependencyInjectionService): void {
  new BoardCommand(di).register(program);
}

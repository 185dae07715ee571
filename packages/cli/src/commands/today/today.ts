import type { Command } from 'commander';
import { TodayCommand } from './today-command';
import type { DependencyInjectionService } from '../../services/dependency-injection';

export function registerTodayCommands(program: Command, di: DependencyInjectionService): void {
  new TodayCommand(di).register(program);
}

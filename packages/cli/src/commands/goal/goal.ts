import type { Command } from 'commander';
import { GoalCommand } from './goal-command';
import type { DependencyInjectionService } from '../../services/dependency-injection';

export function registerGoalCommands(program: Command, di: DependencyInjectionService): void {
  new GoalCommand(di).register(program);
}

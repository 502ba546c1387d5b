import { CommandModule } from 'yargs';

export type CommandModuleWithArgs<Args> = CommandModule<{}, Args>;

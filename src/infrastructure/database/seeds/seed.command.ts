import { Command, CommandRunner, Option } from 'nest-commander';
import { ArtPrintSeederService } from './art-print-seeder.service';

interface SeedCommandOptions {
  stats?: boolean;
}

@Command({
  name: 'seed',
  description: 'Seed the catalog with sample prints when it is empty',
})
export class SeedCommand extends CommandRunner {
  constructor(private readonly seederService: ArtPrintSeederService) {
    super();
  }

  async run(_passedParams: string[], options: SeedCommandOptions): Promise<void> {
    if (options.stats) {
      const stats = await this.seederService.getStats();
      /* eslint-disable no-console */
      console.log('\nCatalog stats:');
      console.log(`   Total prints: ${stats.totalPrints}`);
      console.log(`   Featured: ${stats.featuredPrints}`);
      /* eslint-enable no-console */
      return;
    }

    const result = await this.seederService.seedIfEmpty();

    switch (result.status) {
      case 'seeded':
        // eslint-disable-next-line no-console
        console.log(`\nSeeded ${result.inserted} prints.`);
        break;
      case 'skipped':
        // eslint-disable-next-line no-console
        console.log(`\nNothing to seed: ${result.reason}`);
        break;
      case 'unavailable':
        // eslint-disable-next-line no-console
        console.error(`\nSeed failed: ${result.reason}`);
        process.exitCode = 1;
        break;
    }
  }

  @Option({
    flags: '-s, --stats',
    description: 'Show current catalog statistics',
  })
  parseStats(): boolean {
    return true;
  }
}

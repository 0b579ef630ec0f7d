import chalk from 'chalk';
import { logger } from '../utils/logger.js';

export interface Preset {
  title: string;
  command: string;
}

export const PRESETS: Preset[] = [
  { title: 'Quick start (SQLite + JWT)', command: 'fastapi-kit init my-api --quick' },
  {
    title: 'Production PostgreSQL API',
    command: 'fastapi-kit create my-api --db postgresql --auth jwt --features alembic,docker,testing,cors'
  },
  { title: 'MongoDB document API', command: 'fastapi-kit create my-api --db mongodb --auth jwt --features docker,testing' },
  { title: 'Supabase full stack', command: 'fastapi-kit create my-api --db supabase --auth supabase --features cors,rate_limiting' },
  { title: 'Firebase serverless', command: 'fastapi-kit create my-api --db firebase --auth firebase --features cors' },
  { title: 'Public API without auth', command: 'fastapi-kit create my-api --db sqlite --auth none --features cors,rate_limiting' }
];

export function showPresets(): void {
  logger.heading('🎯 Example project presets');
  logger.newLine();
  for (const preset of PRESETS) {
    console.log(chalk.white.bold(preset.title));
    logger.command(preset.command);
    logger.newLine();
  }
}

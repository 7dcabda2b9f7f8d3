import { env } from '../config/env';
import { listGenerationModels } from '../services/gemini';

async function listModels(apiKey: string | undefined) {
  if (!apiKey) {
    console.error('Please set GEMINI_API_KEY environment variable');
    console.error('Usage: GEMINI_API_KEY=... npm run models:list');
    process.exit(1);
  }

  try {
    const models = await listGenerationModels(apiKey);
    for (const name of models) {
      const marker = name.endsWith(`/${env.GEMINI_MODEL}`) ? ' (configured)' : '';
      console.log(`${name}${marker}`);
    }
    console.log(`\n${models.length} model(s) support generateContent`);
    process.exit(0);
  } catch (error) {
    console.error('Error listing models:', error);
    process.exit(1);
  }
}

void listModels(env.GEMINI_API_KEY);

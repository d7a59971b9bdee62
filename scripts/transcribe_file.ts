import * as dotenv from 'dotenv';
import { loadConfig, validateConfig } from '../src/config';
import { TranscribeApiClient } from '../src/infrastructure/transcription/TranscribeApiClient';

dotenv.config();

async function transcribeFile() {
    const audioPath = process.argv[2];
    const language = process.argv[3];

    if (!audioPath) {
        console.error('❌ Usage: transcribe_file <audio-file> [language]');
        process.exit(1);
    }

    const config = loadConfig();
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        process.exit(1);
    }

    console.log('🧪 Testing transcription service...');
    console.log(`📍 Endpoint: ${config.baseUrl}`);
    console.log('');

    const client = new TranscribeApiClient(config);

    const health = await client.checkHealth();
    console.log(`💓 Health: ${health.status} (model: ${health.model}, v${health.version})`);

    const outcome = await client.transcribe(audioPath, { language });

    if (!outcome.ok) {
        console.error('❌ FAILED!');
        console.error(`Kind: ${outcome.error.kind}`);
        console.error(`Message: ${outcome.error.message}`);
        process.exit(1);
    }

    console.log('✅ SUCCESS!');
    console.log(`🌐 Language: ${outcome.result.language}`);
    console.log(`📝 TL;DR: ${outcome.result.tldr}`);
    console.log('');
    console.log(outcome.result.transcript);
}

transcribeFile().catch((error) => {
    console.error('💥 Fatal error:', error);
    process.exit(1);
});

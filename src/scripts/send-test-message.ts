import { loadSlackSinkOptionsFromEnv } from '../config.js';
import { SlackSink } from '../sinks/slack.sink.js';
import { LogEventLevel } from '../types/log-event.types.js';
import { SinkConfigurationError } from '../types/sink-configuration-error.js';
import { logger } from '../utils/logger.util.js';

/**
 * Script to post one test event to the configured Slack webhook
 *
 * Reads SLACK_* variables from the environment (.env is loaded).
 *
 * Usage: npm run send-test-message -- "Message" [Level]
 */

async function sendTestMessage(): Promise<void> {
  let sink: SlackSink | null = null;
  let exitCode = 0;

  const message = process.argv[2] || 'Test message from {Source}';
  const level = Object.values(LogEventLevel).find(value => value === process.argv[3]) ?? LogEventLevel.Information;

  try {
    const options = loadSlackSinkOptionsFromEnv();

    console.log('\n🚀 Sending Slack test message\n');
    console.log(`💬 Template: ${message}`);
    console.log(`📶 Level: ${level}`);
    if (options.channels.length > 0) {
      console.log(`📣 Channels: ${options.channels.join(', ')}`);
    }
    console.log('');

    sink = new SlackSink({ options, logger });
    sink.emit({
      timestamp: new Date(),
      level,
      messageTemplate: message,
      properties: { Source: 'send-test-message', Environment: process.env.NODE_ENV ?? 'development' },
    });
    await sink.dispose();

    const stats = sink.getStats();
    if (stats.delivered === 1) {
      console.log('✅ Message sent to Slack successfully!\n');
      logger.info('Slack test message sent', { ...stats });
    } else {
      console.log('❌ Failed to send message to Slack (see logs on stderr)\n');
      logger.error('Slack test message was not delivered', undefined, { ...stats });
      exitCode = 1;
    }
  } catch (error) {
    if (error instanceof SinkConfigurationError) {
      console.log('❌ Slack sink is not configured:');
      for (const issue of error.issues) {
        console.log(`   - ${issue}`);
      }
      console.log('   Please set SLACK_WEBHOOK_URL in your .env file\n');
    } else {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.log('❌ Error sending message to Slack');
      console.log(`   Error: ${errorMessage}\n`);
    }
    logger.error('Error sending Slack test message', error);
    exitCode = 1;
  } finally {
    if (sink) {
      try {
        await sink.dispose();
      } catch (error) {
        logger.error('Error during cleanup', error);
      }
    }
  }

  process.exit(exitCode);
}

sendTestMessage().catch(error => {
  logger.fatal('Unhandled error in send-test-message', error);
  process.exit(1);
});

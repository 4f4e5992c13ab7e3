import {
  type BatchReport,
  broadcastItems,
  createFlotilla,
  createSessionsItems,
  deleteItems,
  failureReasons,
  loadFlotillaConfigFromEnv,
} from 'flotilla';
//
import { config } from 'dotenv';
config()
//

const USERS = Array.from({ length: 10 }, (_, index) => ({
  user_name: `User ${index + 1}`,
  user_preferences: `Load test user number ${index + 1}`
}));

const CONVERSATION = [
  'Hi! What can you help me with?',
  'Remember that my favourite colour is teal.',
  'What is my favourite colour?'
];

const flotilla = createFlotilla({
  ...loadFlotillaConfigFromEnv(),
  pool: { capacity: 3, acquireTimeoutMs: 30_000 },
  poolInitialState: (slot) => ({ user_name: `Pooled user ${slot + 1}` })
});

flotilla.on('call:retry', (notice) => console.log('retrying', notice));

function summarize(title: string, report: BatchReport): void {
  console.log(`\n${title}: ${report.succeeded} succeeded, ${report.failed} failed, ${report.skipped} skipped in ${report.durationMs}ms`);
  for (const reason of failureReasons(report)) {
    console.log(`  #${reason.index} (${reason.key}) ${reason.kind}: ${reason.message}`);
  }
}

async function main(): Promise<void> {
  await flotilla.start();

  // Concurrent creation
  const created = await flotilla.runBatch(
    createSessionsItems(flotilla.agentId, USERS, (_, index) => `user-${index + 1}`)
  );
  summarize('Concurrent creation', created);

  const sessionIds: string[] = [];
  for (const outcome of created.outcomes) {
    if (outcome.status === 'succeeded' && outcome.result.kind === 'create') {
      sessionIds.push(outcome.result.session.id);
    }
  }

  // Broadcast
  const broadcast = await flotilla.runBatch(broadcastItems(sessionIds, 'Introduce yourself in one sentence.'));
  summarize('Broadcast', broadcast);

  // Pooled conversations: more conversations than pooled sessions
  const pool = await flotilla.initializePool();
  console.log(`\nPool: ${pool.created}/${pool.requested} sessions ready`);
  for (const failure of pool.failed) {
    console.log(`  slot ${failure.slot} ${failure.error.kind}: ${failure.error.message}`);
  }

  if (pool.created === 0) {
    console.log('  no pooled sessions, skipping conversations');
  } else {
    await converse();
  }

  summarize('Cleanup', await flotilla.runBatch(deleteItems(sessionIds)));
}

async function converse(): Promise<void> {
  const conversations = await Promise.allSettled(
    Array.from({ length: 6 }, (_, index) => flotilla.pool.withSession(async (session) => {
      const replies: string[] = [];
      for (const text of CONVERSATION) {
        replies.push((await flotilla.sendMessage(session, text)).text);
      }
      return `conversation ${index + 1} on ${flotilla.chatUrl(session.id)}: ${replies.at(-1) ?? ''}`;
    }))
  );
  for (const result of conversations) {
    console.log(result.status === 'fulfilled' ? `  ${result.value}` : `  failed: ${String(result.reason)}`);
  }
}

void main()
  .catch(console.error)
  .finally(() => flotilla.close())
  .catch(console.error);

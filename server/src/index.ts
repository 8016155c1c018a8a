import { createApp } from './app';
import { env } from './config/env';
import { firebaseClients } from './config/firebase';
import { FirestoreGateway } from './gateway/firestore.gateway';

const { firebaseAuth, firestore } = firebaseClients(env);

const app = createApp({
  gateway: new FirestoreGateway(firestore, { timeoutMs: env.STORE_TIMEOUT_MS }),
  verifyIdToken: (token) => firebaseAuth.verifyIdToken(token),
  nodeEnv: env.NODE_ENV,
  clientUrl: env.CLIENT_URL,
  rateLimitMax: env.RATE_LIMIT_MAX
});

app.listen(env.PORT, () => {
  console.log(`API server ready on http://localhost:${env.PORT} (${env.NODE_ENV})`);
});

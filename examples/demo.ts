import pg from 'pg';
import { MemoryStore, MultiIndexQuery, PostgresStore } from '../src/index.js';
import type { KeyValueStore } from '../src/index.js';

const BUCKET = 'people';
const DATABASE_URL = process.env['DATABASE_URL'];

async function createStore(): Promise<KeyValueStore> {
  if (!DATABASE_URL) {
    console.log('DATABASE_URL not set, using the in-memory store');
    return new MemoryStore();
  }
  const store = new PostgresStore({ pool: new pg.Pool({ connectionString: DATABASE_URL }) });
  await store.initializeSchema();
  return store;
}

async function print(query: MultiIndexQuery): Promise<void> {
  for await (const [key, person] of query.run()) {
    console.log(key, person);
  }
  console.log(`Last executed query: ${query}`);
}

const store = await createStore();

try {
  await store.put(BUCKET, 'sree', { name: 'Sreejith', age: 25 }, [
    { name: 'name_bin', value: 'Sreejith' },
    { name: 'age_int', value: 25 },
  ]);
  await store.put(BUCKET, 'vishnu', { name: 'Vishnu', age: 31 }, [
    { name: 'name_bin', value: 'Vishnu' },
    { name: 'age_int', value: 31 },
  ]);

  const query = new MultiIndexQuery({ client: store, bucket: BUCKET });
  await print(query.filter('name', '==', 'Sreejith'));
  await print(query.reset().filter('age', '<', 50).filter('name', '==', 'Vishnu'));
  await print(query.reset().filter('age', '<', 50).order('age', 'ASC'));
  await print(query.reset().limit(1));
  await print(query.reset().order('age', 'ASC').offset(1).limit(1));

  // remove the demo data
  for await (const [key] of query.reset().run()) {
    await store.delete(BUCKET, key);
  }
} catch (err) {
  console.error('Demo failed:', err);
  process.exitCode = 1;
} finally {
  await store.close();
}

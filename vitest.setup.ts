/* IndexedDB for Dexie under Node. Must load before any module imports dexie. */
import 'fake-indexeddb/auto';

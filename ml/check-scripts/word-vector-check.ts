import { mostSimilarWords } from '../lib/nearest-neighbor';
import { TABLE_PATH_ENV } from '../lib/options';
import { loadTable, lookup } from '../lib/vector-store';

const [tablePath, word] = process.env[TABLE_PATH_ENV]
  ? [process.env[TABLE_PATH_ENV], process.argv[2]]
  : process.argv.slice(2);

if (!tablePath || !word) {
  console.error(`Usage: word-vector-check <table-path> <word> (or set ${TABLE_PATH_ENV} and pass only the word)`);
  process.exitCode = 2;
} else {
  loadTable(tablePath, { lenient: true })
    .then(table => {
      console.log('vector', lookup(table, word));
      console.log('mostSimilar', mostSimilarWords(table, word, 20));
    })
    .catch(err => {
      console.error(err);
      process.exitCode = 1;
    });
}

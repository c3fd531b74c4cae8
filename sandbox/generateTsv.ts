import * as fs from 'fs';
import * as path from 'path';

// Header mixes bare names with ones that need quoting
const headers = [
  'record_id',
  'symbol',
  'display name',
  'locus-type',
  'status',
  'region',
  'Date Modified',
  'score',
  'aliases',
  '_flags',
];

const prefixes = ['ABC', 'KLF', 'ZNF', 'SLC', 'TMEM', 'CDH', 'RBM', 'MYO'];
const locusTypes = ['coding', 'non-coding', 'pseudo', 'unknown'];
const statuses = ['approved', 'withdrawn', 'pending'];
const regions = ['1p36', '2q11', '3p21', '7q31', '11p15', '17q21', 'Xq28'];

function randomElement<T>(arr: T[]): T {
  return arr[Math.floor(Math.random() * arr.length)];
}

function randomInt(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

function randomDate(startYear: number = 2015, endYear: number = 2024): string {
  const year = randomInt(startYear, endYear);
  const month = String(randomInt(1, 12)).padStart(2, '0');
  const day = String(randomInt(1, 28)).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * One row of fields. Trailing optional fields are sometimes dropped so the
 * file has short rows as well.
 */
function generateRandomRow(id: number): string[] {
  const symbol = `${randomElement(prefixes)}${randomInt(1, 99)}`;
  const row = [
    `REC:${id}`,
    symbol,
    `${symbol} family member ${randomInt(1, 9)}`,
    randomElement(locusTypes),
    randomElement(statuses),
    randomElement(regions),
    randomDate(),
    (Math.random() * 100).toFixed(2),
    Math.random() > 0.5 ? `${symbol}A|${symbol}B` : '',
    Math.random() > 0.8 ? 'x' : '',
  ];
  return Math.random() > 0.9 ? row.slice(0, randomInt(6, row.length - 1)) : row;
}

function generateTsvFile(numRows: number, outputPath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const startTime = Date.now();
    const writeStream = fs.createWriteStream(outputPath, { encoding: 'utf-8' });

    writeStream.on('error', reject);
    writeStream.on('finish', () => {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const fileSizeMB = (fs.statSync(outputPath).size / (1024 * 1024)).toFixed(1);

      console.log(`\nGenerated TSV file:`);
      console.log(`  Path: ${outputPath}`);
      console.log(`  Rows: ${numRows.toLocaleString()} (+ header)`);
      console.log(`  Columns: ${headers.length}`);
      console.log(`  Size: ${fileSizeMB} MB`);
      console.log(`  Time: ${elapsed}s`);
      resolve();
    });

    writeStream.write(headers.join('\t') + '\n');

    const batchSize = 1000;
    let batch: string[] = [];

    console.log(`Generating TSV file with ${numRows.toLocaleString()} rows...`);

    for (let i = 1; i <= numRows; i++) {
      batch.push(generateRandomRow(i).join('\t'));

      if (batch.length >= batchSize) {
        writeStream.write(batch.join('\n') + '\n');
        batch = [];
      }

      if (i % 100000 === 0) {
        const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
        console.log(`  Generated ${i.toLocaleString()} rows (${elapsed}s)...`);
      }
    }

    if (batch.length > 0) {
      writeStream.write(batch.join('\n') + '\n');
    }

    writeStream.end();
  });
}

// Parse command line arguments
const args = process.argv.slice(2);
const numRows = args[0] ? parseInt(args[0], 10) : 10000;

if (isNaN(numRows) || numRows < 1) {
  console.error('Error: Invalid number of rows');
  console.error('Usage: npm run generate:sample -- <num_rows>');
  console.error('  num_rows: Number of data rows to generate (default: 10000)');
  process.exit(1);
}

const outputPath = path.join(__dirname, `sample-${numRows}.tsv`);

(async () => {
  try {
    await generateTsvFile(numRows, outputPath);
  } catch (error) {
    console.error('Error generating TSV file:', error);
    process.exit(1);
  }
})();

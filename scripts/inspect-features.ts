import { loadConfig } from '../server/config';
import { getErrorMessage } from '../server/errors';
import { parseDocument } from '../server/services/document-parser';
import { extractAddress, extractPrice, extractProperty } from '../server/services/extractors';
import { RequestHandler } from '../server/services/request-handler';

// Usage: npm run inspect -- <listing url>
async function inspectFeatures() {
  const url = process.argv[2];
  if (!url) {
    console.error('❌ Usage: npm run inspect -- <listing url>');
    process.exitCode = 1;
    return;
  }

  let requestHandler: RequestHandler | undefined;

  try {
    const config = loadConfig();
    requestHandler = new RequestHandler({
      timeoutMs: config.timeoutMs,
      maxAttempts: config.maxAttempts,
      backoffFactor: config.backoffFactor,
    });

    console.log('🔍 Inspecting:', url);
    const html = await requestHandler.get(url);
    console.log('✅ HTML fetched, size:', html.length, 'bytes');

    const doc = parseDocument(html);
    console.log(`\n📊 Feature table (${Object.keys(doc.featureTable).length} entries):`);
    console.log(doc.featureTable);
    console.log(`\n🧩 JSON-LD blocks: ${doc.structuredData.length}`);
    console.log('📰 Title:', doc.title ?? 'NONE');

    const address = extractAddress(doc);
    const property = extractProperty(doc);
    const price = extractPrice(doc, property.value?.property.living_area ?? null);

    if (address.value) console.log('\n🏠 Address:', address.value);
    if (price.value) console.log('💶 Price:', price.value);

    const warnings = [...doc.warnings, ...address.warnings, ...property.warnings, ...price.warnings];
    warnings.forEach(w => console.log('⚠️', w));
  } catch (error) {
    console.error('❌ Error:', getErrorMessage(error));
    process.exitCode = 1;
  } finally {
    requestHandler?.close();
  }
}

void inspectFeatures();

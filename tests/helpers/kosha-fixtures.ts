import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export const KANDA_ONE = 'प्रथमकाण्डः';
export const KANDA_THREE = 'तृतीयकाण्डः';
export const SVARGA = 'स्वर्गवर्गः';
export const NANARTHA = 'नानार्थवर्गः';
export const VISHESHYA = 'विशेष्यनिघ्नवर्गः';
export const BHVADI = 'भ्वादिगणः';

export const SHLOKA_ONE = 'प्रथमः श्लोकः ॥';
export const SHLOKA_TWO = 'द्वितीयः श्लोकः ॥';
export const NANARTHA_SHLOKA = 'नानार्थश्लोकः ॥';
export const ADHIKAAR_SHLOKA = 'अधिकारश्लोकः ॥';

export const STANDARD_VARGA = [
  `"${SHLOKA_ONE}":`,
  '  "सत्तायाम्":',
  '    "भवति":',
  '    - "01.0001"',
  '    "प्रभवति":',
  '    - "प्र"',
  '    - "01.0001"',
  '  "गतौ":',
  '    "गच्छति": null',
  `"${SHLOKA_TWO}":`,
  '  "गतौ":',
  '    "गच्छति":',
  '    - "01.0982, 01.1000"',
  '    "अनुगच्छति":',
  '    - "अनु"',
  '    - "Not Found"',
  '',
].join('\n');

export const NANARTHA_VARGA = [
  `"${NANARTHA_SHLOKA}": null`,
  '"भवति":',
  '- "सत्तायाम्":',
  '  - "01.0001"',
  '- "प्राप्तौ":',
  '  - "प्र"',
  '  - "01.0001, 01.0002"',
  '',
].join('\n');

export const ADHIKAAR_FILE = [
  `"${ADHIKAAR_SHLOKA}":`,
  '  "दीप्तौ":',
  '    "ज्वलति":',
  '    - "Not Found"',
  '',
].join('\n');

export interface CanonicalFixture {
  root: string;
  standardPath: string;
  nanarthaPath: string;
  adhikaarPath: string;
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Data/
 *   1_प्रथमकाण्डः/1_स्वर्गवर्गः.yaml          standard layout
 *   1_प्रथमकाण्डः/mangalam.yaml              ignored
 *   3_तृतीयकाण्डः/1_विशेष्यनिघ्नवर्गः/1_भ्वादिगणः.yaml
 *   3_तृतीयकाण्डः/3_नानार्थवर्गः.yaml        list layout
 */
export async function writeCanonicalTree(base: string): Promise<CanonicalFixture> {
  const root = path.join(base, 'Data');
  const kandaOne = path.join(root, `1_${KANDA_ONE}`);
  const kandaThree = path.join(root, `3_${KANDA_THREE}`);
  const adhikaarDir = path.join(kandaThree, `1_${VISHESHYA}`);
  await fs.mkdir(kandaOne, { recursive: true });
  await fs.mkdir(adhikaarDir, { recursive: true });

  const standardPath = path.join(kandaOne, `1_${SVARGA}.yaml`);
  const nanarthaPath = path.join(kandaThree, `3_${NANARTHA}.yaml`);
  const adhikaarPath = path.join(adhikaarDir, `1_${BHVADI}.yaml`);

  await fs.writeFile(standardPath, STANDARD_VARGA, 'utf8');
  await fs.writeFile(path.join(kandaOne, 'mangalam.yaml'), '"मङ्गलम् ॥": null\n', 'utf8');
  await fs.writeFile(nanarthaPath, NANARTHA_VARGA, 'utf8');
  await fs.writeFile(adhikaarPath, ADHIKAAR_FILE, 'utf8');

  return { root, standardPath, nanarthaPath, adhikaarPath };
}

export interface ReviewEntryInput {
  form: string;
  dhatu_id?: string;
  dhatu_ids?: string;
  gati?: string;
  kanda: string;
  varga: string;
  adhikaar?: string;
  artha: string;
  shloka_num?: string;
  shloka_text: string;
  resolved?: boolean;
  comment?: string;
}

/** Review files are YAML; JSON is a valid spelling of it. */
export async function writeReviewJson(filePath: string, entries: Record<string, ReviewEntryInput>): Promise<void> {
  const withDefaults = Object.fromEntries(
    Object.entries(entries).map(([key, entry]) => [
      key,
      { gati: '', adhikaar: '', shloka_num: '1', comment: '', ...entry },
    ]),
  );
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(withDefaults, null, 2)}\n`, 'utf8');
}

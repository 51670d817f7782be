/**
 * One parameter reference table: key, accepted values, meaning
 */
export interface ParameterTable {
  title: string;
  rows: ReadonlyArray<readonly [parameter: string, values: string, description: string]>;
}

export const PARAMETER_TABLES: readonly ParameterTable[] = [
  {
    title: 'Apple VAS Parameters',
    rows: [
      ['VAS#MerchantID', 'String', 'Apple Pass Type ID (pass.com.*)'],
      ['VAS#KeySlot', '1-6', 'Private key slot'],
      ['VAS#MerchantURL', 'URL', 'Optional URL for pass'],
      ['VASDefaultPassesEnabled', '1-6,...', 'Pass slots checked at startup'],
    ],
  },
  {
    title: 'Google Smart Tap Parameters',
    rows: [
      ['ST#CollectorID', 'String', 'Google Collector ID'],
      ['ST#KeySlot', '0-6', 'Private key slot (0=not assigned)'],
      ['ST#KeyVersion', 'Integer', 'Key version number'],
      ['STDefaultPassesEnabled', '1-6,...', 'Pass slots checked at startup'],
    ],
  },
  {
    title: 'NFC Tag Parameters',
    rows: [
      ['NFCType2', '0,U,N,B', 'Type 2 mode (NTAG, Ultralight)'],
      ['NFCType4', '0,U,N,B,D', 'Type 4 mode (DESFire, ISO14443-4)'],
      ['NFCType5', '0,U,N,B', 'Type 5 mode (ICODE, ISO15693)'],
      ['IgnoreRandomUID', '0,1', 'Filter random UIDs'],
      ['TagReadBlockNum', '0-255', 'Block to read in block mode'],
      ['TagReadFormat', 'a,d,h', 'Output as ASCII, decimal or hex'],
    ],
  },
  {
    title: 'MIFARE DESFire Parameters',
    rows: [
      ['DESFire#AppID', 'Hex (6)', 'Application ID'],
      ['DESFire#FileID', '1-255', 'File ID to read'],
      ['DESFire#KeySlot', '1-9', 'Key slot for auth'],
      ['DESFire#Crypto', '0,1,3', 'Crypto mode (0=None, 1=3DES, 3=AES)'],
      ['DESFireSeparator', 'Char', 'Separator between app outputs (default: ,)'],
    ],
  },
  {
    title: 'Keyboard Emulation Parameters',
    rows: [
      ['KBLogMode', '0,1', 'Enable keyboard emulation'],
      ['KBSource', 'Hex', 'Data sources bitmask (80=passes, 01=card UID)'],
      ['KBPrefix', 'String', 'Prefix before data'],
      ['KBPostfix', 'String', 'Postfix after data (default: %0A)'],
      ['KBDelayMS', '5-255', 'Delay between keystrokes (ms)'],
    ],
  },
  {
    title: 'LED Parameters',
    rows: [
      ['LEDMode', '0-3', 'LED mode (0=Off, 1=On, 2=Status, 3=Custom)'],
      ['LEDSelect', '0-3', 'LED type (0=External, 1/2=Onboard, 3=Serial)'],
      ['PassLED', 'Color,on,off,rep', 'LED on successful read'],
      ['PassErrorLED', 'Color,on,off,rep', 'LED on error'],
    ],
  },
  {
    title: 'Beep Parameters',
    rows: [
      ['PassBeep', 'on,off,rep[,freq]', 'Beep on successful read'],
      ['PassErrorBeep', 'on,off,rep[,freq]', 'Beep on error'],
      ['TagBeep', 'on,off,rep[,freq]', 'Beep on tag read'],
      ['StartBeep', 'on,off,rep[,freq]', 'Beep on startup'],
    ],
  },
];

const HEADINGS = ['Parameter', 'Values', 'Description'] as const;

/**
 * Render one table as padded plain-text columns
 */
export function renderTable(table: ParameterTable): string {
  const rows = [HEADINGS, ...table.rows];
  const widths = HEADINGS.map((_, column) =>
    Math.max(...rows.map((row) => row[column].length))
  );
  const format = (row: readonly string[]): string =>
    row.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd();

  return [`=== ${table.title} ===`, format(HEADINGS), ...table.rows.map(format)].join('\n');
}

export function renderDocs(tables: readonly ParameterTable[] = PARAMETER_TABLES): string {
  return tables.map(renderTable).join('\n\n');
}

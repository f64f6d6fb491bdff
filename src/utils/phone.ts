// Kenyan MSISDN normalisation: 0712345678, +254712345678 and 254712345678 all become 254712345678
const MSISDN = /^254[17]\d{8}$/;

export function normalizeMsisdn(phone: string): string | null {
  const digits = phone.replace(/[\s\-()+]/g, '');
  const international = digits.startsWith('0') ? `254${digits.slice(1)}` : digits;
  return MSISDN.test(international) ? international : null;
}

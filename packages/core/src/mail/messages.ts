import type { InsightName, Locale } from './types.js';

export type HighlightKind =
  | 'suspicious_keywords'
  | 'suspicious_domains'
  | 'many_urls'
  | 'link_mismatch'
  | 'from_domain_suspicious'
  | 'reply_to_different'
  | 'excessive_urgency'
  | 'trust_signals';

export interface MessageCatalog {
  highlights: Record<HighlightKind, string>;
  insights: Record<InsightName, string>;
}

// Templates take positional parameters: {0}, {1}, ...
const CATALOGS: Record<Locale, MessageCatalog> = {
  en: {
    highlights: {
      suspicious_keywords: 'Detected {0} suspicious word(s) or phrase(s) in the message.',
      suspicious_domains: 'Detected {0} link(s) pointing to a suspicious domain.',
      many_urls: 'The message contains an unusually large number of links ({0}).',
      link_mismatch: 'A link\'s visible text does not match its actual destination.',
      from_domain_suspicious: 'The sender\'s domain is suspicious.',
      reply_to_different: 'The reply-to address differs from the sender address.',
      excessive_urgency: 'The message contains excessive urgency language.',
      trust_signals: 'Detected {0} trust signal(s) that may indicate a legitimate message.',
    },
    insights: {
      suspicious_keywords: 'Number of suspicious words detected',
      url_count: 'Number of links in the message',
      suspicious_domains: 'Number of links with suspicious domains',
      link_mismatch: 'Mismatch between link text and actual link',
      from_domain_suspicious: 'Sender domain is suspicious',
      trust_signals: 'Trust signals detected',
    },
  },
  ar: {
    highlights: {
      suspicious_keywords: 'تم اكتشاف {0} كلمة/عبارة مشبوهة في الرسالة.',
      suspicious_domains: 'تم اكتشاف {0} رابط يحتوي على نطاق مشبوه.',
      many_urls: 'الرسالة تحتوي على عدد كبير من الروابط ({0}).',
      link_mismatch: 'تم اكتشاف عدم تطابق بين نص الرابط والرابط الفعلي.',
      from_domain_suspicious: 'نطاق المرسل مشبوه.',
      reply_to_different: 'عنوان الرد يختلف عن عنوان المرسل.',
      excessive_urgency: 'الرسالة تحتوي على كلمات إلحاح مفرطة.',
      trust_signals: 'تم اكتشاف {0} إشارة ثقة قد تشير إلى رسالة شرعية.',
    },
    insights: {
      suspicious_keywords: 'عدد الكلمات المشبوهة المكتشفة',
      url_count: 'عدد الروابط في الرسالة',
      suspicious_domains: 'عدد الروابط بنطاقات مشبوهة',
      link_mismatch: 'عدم تطابق بين نص الرابط والرابط الفعلي',
      from_domain_suspicious: 'نطاق المرسل مشبوه',
      trust_signals: 'إشارات الثقة المكتشفة',
    },
  },
};

export const SUPPORTED_LOCALES: readonly Locale[] = ['en', 'ar'];

export function isLocale(value: string): value is Locale {
  return SUPPORTED_LOCALES.some((locale) => locale === value);
}

export function getCatalog(locale: Locale = 'en'): MessageCatalog {
  return CATALOGS[locale];
}

export function formatTemplate(template: string, params: readonly (string | number)[]): string {
  return template.replace(/\{(\d+)\}/g, (placeholder, index: string) => {
    const value = params[Number(index)];
    return value === undefined ? placeholder : String(value);
  });
}

export function formatHighlight(kind: HighlightKind, params: readonly (string | number)[] = [], locale: Locale = 'en'): string {
  return formatTemplate(CATALOGS[locale].highlights[kind], params);
}

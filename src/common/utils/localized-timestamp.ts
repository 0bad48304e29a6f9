const default_locale = Intl.DateTimeFormat().resolvedOptions().locale;

const format_options: Intl.DateTimeFormatOptions = {
  month: 'short',
  day: 'numeric',
  hour: 'numeric',
  minute: '2-digit',
};

const localizedTimestamp = (date: Date, locale = default_locale, time_zone?: string): string => {
  return new Intl.DateTimeFormat(locale, { ...format_options, timeZone: time_zone }).format(date);
};

export default localizedTimestamp;

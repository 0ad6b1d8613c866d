import { Culture } from './cultures';

export type MessageKey =
  | 'appTitle'
  | 'signIn'
  | 'username'
  | 'password'
  | 'invalidCredentials'
  | 'dashboard'
  | 'collections'
  | 'sales'
  | 'entries'
  | 'litres'
  | 'amount'
  | 'logout';

const MESSAGES: Record<Culture, Record<MessageKey, string>> = {
  'en-US': {
    appTitle: 'Dairy Cooperative',
    signIn: 'Sign in',
    username: 'Username',
    password: 'Password',
    invalidCredentials: 'Invalid username or password',
    dashboard: 'Dashboard',
    collections: 'Milk collections',
    sales: 'Sales',
    entries: 'Entries',
    litres: 'Litres',
    amount: 'Amount',
    logout: 'Log out',
  },
  'hi-IN': {
    appTitle: 'दुग्ध सहकारी',
    signIn: 'साइन इन करें',
    username: 'उपयोगकर्ता नाम',
    password: 'पासवर्ड',
    invalidCredentials: 'अमान्य उपयोगकर्ता नाम या पासवर्ड',
    dashboard: 'डैशबोर्ड',
    collections: 'दूध संग्रह',
    sales: 'बिक्री',
    entries: 'प्रविष्टियाँ',
    litres: 'लीटर',
    amount: 'राशि',
    logout: 'लॉग आउट',
  },
};

export function t(culture: Culture, key: MessageKey): string {
  return MESSAGES[culture][key];
}

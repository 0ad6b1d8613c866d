import { Culture } from '../../../../../shared/i18n/cultures';
import { t } from '../../../../../shared/i18n/messages';
import { escapeHtml, layout } from '../../../../../shared/utils/html';

export interface LoginViewModel {
  culture: Culture;
  username?: string;
  failed?: boolean;
}

export function renderLoginPage(model: LoginViewModel): string {
  const { culture } = model;
  const error = model.failed
    ? `<p class="error" role="alert">${escapeHtml(t(culture, 'invalidCredentials'))}</p>`
    : '';

  return layout(
    `${t(culture, 'appTitle')} - ${t(culture, 'signIn')}`,
    culture,
    `<div class="card">
  <h1>${escapeHtml(t(culture, 'appTitle'))}</h1>
  ${error}
  <form method="post" action="/login">
    <label for="username">${escapeHtml(t(culture, 'username'))}</label>
    <input id="username" name="username" autocomplete="username" value="${escapeHtml(model.username ?? '')}" required>
    <label for="password">${escapeHtml(t(culture, 'password'))}</label>
    <input id="password" name="password" type="password" autocomplete="current-password" required>
    <button type="submit">${escapeHtml(t(culture, 'signIn'))}</button>
  </form>
</div>`
  );
}

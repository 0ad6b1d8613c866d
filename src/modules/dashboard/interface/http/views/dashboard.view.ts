import { Culture, formatDate, formatNumber } from '../../../../../shared/i18n/cultures';
import { t } from '../../../../../shared/i18n/messages';
import { escapeHtml, layout } from '../../../../../shared/utils/html';
import { DailySummary } from '../../../../collections/domain/milk-collection.entity';
import { DashboardSummary } from '../../../domain/dashboard-summary';

export interface DashboardViewModel {
  culture: Culture;
  username: string;
  summary: DashboardSummary;
}

function summaryRow(label: string, summary: DailySummary, culture: Culture): string {
  return `<tr>
      <th scope="row">${escapeHtml(label)}</th>
      <td>${formatNumber(summary.count, culture, 0)}</td>
      <td>${formatNumber(summary.litres, culture)}</td>
      <td>${formatNumber(summary.amount, culture)}</td>
    </tr>`;
}

export function renderDashboardPage(model: DashboardViewModel): string {
  const { culture, summary } = model;

  return layout(
    `${t(culture, 'appTitle')} - ${t(culture, 'dashboard')}`,
    culture,
    `<div class="card">
  <h1>${escapeHtml(t(culture, 'dashboard'))}</h1>
  <p>${escapeHtml(model.username)} &middot; ${escapeHtml(formatDate(summary.date, culture))} &middot; <a href="/logout">${escapeHtml(t(culture, 'logout'))}</a></p>
</div>
<div class="card">
  <table>
    <thead>
      <tr><th></th><th>${escapeHtml(t(culture, 'entries'))}</th><th>${escapeHtml(t(culture, 'litres'))}</th><th>${escapeHtml(t(culture, 'amount'))}</th></tr>
    </thead>
    <tbody>
    ${summaryRow(t(culture, 'collections'), summary.collections, culture)}
    ${summaryRow(t(culture, 'sales'), summary.sales, culture)}
    </tbody>
  </table>
</div>`
  );
}

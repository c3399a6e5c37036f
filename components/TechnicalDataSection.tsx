import React from 'react';
import type { AnalysisRun } from '../api/lib/types.js';
import { formatFlag, formatVolume, pageMetricRows } from '../api/lib/report/model.js';

interface TechnicalDataSectionProps {
  run: AnalysisRun;
}

export const TechnicalDataSection: React.FC<TechnicalDataSectionProps> = ({ run }) => (
  <section id="technical-data">
    <h2>Technical Data</h2>

    <h3>Page Metrics</h3>
    {run.site.error ? (
      <p className="empty">{`Page could not be measured: ${run.site.error}`}</p>
    ) : (
      <table>
        <tbody>
          {pageMetricRows(run.site).map(([label, value]) => (
            <tr key={label}>
              <th scope="row">{label}</th>
              <td>{value}</td>
            </tr>
          ))}
        </tbody>
      </table>
    )}

    {run.competitors.length > 0 && (
      <>
        <h3>Competitors</h3>
        <table>
          <thead>
            <tr>
              <th>URL</th>
              <th>Load time</th>
              <th>Word count</th>
              <th>Mobile</th>
            </tr>
          </thead>
          <tbody>
            {run.competitors.map((competitor) => (
              <tr key={competitor.url}>
                <td>{competitor.url}</td>
                <td>{competitor.error ? 'N/A' : `${competitor.loadTime}s`}</td>
                <td>{competitor.error ? 'N/A' : competitor.wordCount}</td>
                <td>{competitor.error ? 'N/A' : formatFlag(competitor.mobileFriendly)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </>
    )}

    {run.keywords.length > 0 && (
      <>
        <h3>Keywords</h3>
        <table>
          <thead>
            <tr>
              <th>Keyword</th>
              <th>Volume</th>
              <th>Difficulty</th>
              <th>CPC</th>
              <th>Source</th>
            </tr>
          </thead>
          <tbody>
            {run.keywords.map((keyword) => (
              <tr key={keyword.keyword}>
                <td>{keyword.keyword}</td>
                <td>{formatVolume(keyword.searchVolume)}</td>
                <td>{keyword.difficulty}</td>
                <td>${keyword.cpc.toFixed(2)}</td>
                <td>{keyword.source}</td>
              </tr>
            ))}
          </tbody>
        </table>
        {run.keywordSuggestions.length > 0 && (
          <p>
            <strong>Suggested keywords:</strong> {run.keywordSuggestions.join(', ')}
          </p>
        )}
      </>
    )}
  </section>
);

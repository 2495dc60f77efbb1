'use client';

import { useEffect, useState, type FormEvent } from 'react';
import {
  canSubmitSearch,
  downloadMessage,
  errorFrom,
  toDocumentRows,
  toSuggestions,
} from '../lib/finderForm';
import type { DocumentRow, Suggestion } from '../lib/schemas';

const REGION_OPTIONS = [
  { id: 'india', label: 'India' },
  { id: 'us', label: 'United States' },
  { id: 'japan', label: 'Japan' },
  { id: 'korea', label: 'South Korea' },
  { id: 'china', label: 'China' },
];

const DOC_TYPE_OPTIONS = [
  { id: 'transcript', label: 'Transcripts' },
  { id: 'presentation', label: 'Presentations' },
  { id: 'press_release', label: 'Press releases' },
];

export function DocumentFinderClient() {
  const [company, setCompany] = useState('');
  const [region, setRegion] = useState('india');
  const [count, setCount] = useState(5);
  const [docTypes, setDocTypes] = useState<string[]>(['transcript', 'presentation']);
  const [suggestions, setSuggestions] = useState<Suggestion[]>([]);
  const [documents, setDocuments] = useState<DocumentRow[]>([]);
  const [loading, setLoading] = useState(false);
  const [status, setStatus] = useState<string | null>(null);

  useEffect(() => {
    const query = company.trim();
    if (query.length < 2) {
      setSuggestions([]);
      return;
    }
    const controller = new AbortController();
    const timer = setTimeout(async () => {
      try {
        const params = new URLSearchParams({ q: query, region, limit: '8' });
        const res = await fetch(`/api/companies/suggest?${params}`, { signal: controller.signal });
        setSuggestions(res.ok ? toSuggestions(await res.json()) : []);
      } catch {
        // Ignore aborted and failed lookups.
        setSuggestions([]);
      }
    }, 200);
    return () => {
      clearTimeout(timer);
      controller.abort();
    };
  }, [company, region]);

  const toggleDocType = (id: string) => {
    setDocTypes((current) =>
      current.includes(id) ? current.filter((value) => value !== id) : [...current, id],
    );
  };

  const handleSearch = async (event: FormEvent) => {
    event.preventDefault();
    if (!canSubmitSearch(company, docTypes, loading)) return;
    setStatus(null);
    setLoading(true);
    setDocuments([]);
    setSuggestions([]);

    try {
      const params = new URLSearchParams({
        company,
        region,
        count: String(count),
        types: docTypes.join(','),
      });
      const res = await fetch(`/api/documents?${params}`);
      const data: unknown = await res.json().catch(() => ({}));
      if (!res.ok) {
        setStatus(errorFrom(data, 'Unable to search right now.'));
        return;
      }
      const rows = toDocumentRows(data);
      setDocuments(rows);
      setStatus(rows.length > 0 ? `Found ${rows.length} document(s).` : 'No documents found.');
    } catch {
      setStatus('Unable to search right now.');
    } finally {
      setLoading(false);
    }
  };

  const handleDownload = async () => {
    setLoading(true);
    setStatus(null);
    try {
      const res = await fetch('/api/downloads', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          company,
          region,
          count,
          includeTranscripts: docTypes.includes('transcript'),
          includePresentations: docTypes.includes('presentation'),
          includePressReleases: docTypes.includes('press_release'),
        }),
      });
      const data: unknown = await res.json().catch(() => ({}));
      if (!res.ok) {
        setStatus(errorFrom(data, 'Download failed.'));
        return;
      }
      setStatus(downloadMessage(data));
    } catch {
      setStatus('Download failed.');
    } finally {
      setLoading(false);
    }
  };

  return (
    <div className="finder-ui">
      <form className="finder-form" onSubmit={handleSearch}>
        <label className="finder-label" htmlFor="company">
          Company
        </label>
        <input
          id="company"
          name="company"
          className="finder-input"
          placeholder="Tata Motors, Apple"
          autoComplete="off"
          value={company}
          onChange={(event) => setCompany(event.target.value)}
        />
        {suggestions.length > 0 ? (
          <ul className="finder-suggestions">
            {suggestions.map((suggestion) => (
              <li key={suggestion.label}>
                <button
                  type="button"
                  onClick={() => {
                    setCompany(suggestion.name);
                    setSuggestions([]);
                  }}
                >
                  {suggestion.label}
                </button>
              </li>
            ))}
          </ul>
        ) : null}

        <label className="finder-label" htmlFor="region">
          Region
        </label>
        <select
          id="region"
          className="finder-input"
          value={region}
          onChange={(event) => setRegion(event.target.value)}
        >
          {REGION_OPTIONS.map((option) => (
            <option key={option.id} value={option.id}>
              {option.label}
            </option>
          ))}
        </select>

        <label className="finder-label" htmlFor="count">
          Quarters
        </label>
        <input
          id="count"
          type="number"
          min={1}
          max={20}
          className="finder-input"
          value={count}
          onChange={(event) => setCount(Number.parseInt(event.target.value, 10) || 1)}
        />

        <fieldset className="finder-types">
          {DOC_TYPE_OPTIONS.map((option) => (
            <label key={option.id}>
              <input
                type="checkbox"
                checked={docTypes.includes(option.id)}
                onChange={() => toggleDocType(option.id)}
              />{' '}
              {option.label}
            </label>
          ))}
        </fieldset>

        <button className="finder-button" type="submit" disabled={!canSubmitSearch(company, docTypes, loading)}>
          {loading ? 'Working...' : 'Find documents'}
        </button>
        {status ? <p className="finder-status">{status}</p> : null}
      </form>

      {documents.length > 0 ? (
        <section className="finder-results" aria-live="polite">
          <table>
            <thead>
              <tr>
                <th>Company</th>
                <th>Period</th>
                <th>Type</th>
                <th>Source</th>
              </tr>
            </thead>
            <tbody>
              {documents.map((doc) => (
                <tr key={doc.url}>
                  <td>
                    <a href={doc.url} title={doc.filename} target="_blank" rel="noreferrer">
                      {doc.company}
                    </a>
                  </td>
                  <td>{`${doc.quarter} ${doc.year}`.trim()}</td>
                  <td>{doc.docType}</td>
                  <td>{doc.source}</td>
                </tr>
              ))}
            </tbody>
          </table>
          <button className="finder-button" type="button" disabled={loading} onClick={handleDownload}>
            {loading ? 'Downloading...' : `Download ${documents.length} file(s)`}
          </button>
        </section>
      ) : null}
    </div>
  );
}

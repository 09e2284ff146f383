/**
 * Page Templates
 * Form page and metadata fragment markup.
 */

export const HOME_PAGE_TEMPLATE = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Music Link Converter (Legal)</title>
</head>
<body>
<h1>Music Link Converter (Legal)</h1>
<p><strong>Heads up:</strong> This app will not download from {{BLOCKED_PLATFORMS}}. Use uploads or direct audio file URLs you have rights to.</p>

<form method="post" action="/convert" enctype="multipart/form-data" style="margin-bottom:2rem;">
  <fieldset>
    <legend>1) Provide source</legend>
    <label>Upload audio file:
      <input type="file" name="file">
    </label>
    <br><br>
    <label>OR direct audio file URL:
      <input type="url" name="file_url" placeholder="https://example.com/song.flac" style="width:32rem;">
    </label>
  </fieldset>
  <br>
  <fieldset>
    <legend>2) Choose output</legend>
{{FORMAT_OPTIONS}}
  </fieldset>
  <br>
  <label>
    <input type="checkbox" name="rights" required>
    I confirm I own the content or have permission to convert and download it.
  </label>
  <br><br>
  <button type="submit">Convert</button>
</form>

<hr>

<h2>Metadata (display only)</h2>
<form method="get" action="/meta">
  <input type="url" name="link" placeholder="Spotify/Apple/YouTube/SoundCloud link" style="width:32rem;" required>
  <button type="submit">Fetch</button>
</form>
</body>
</html>`;

export const FORMAT_OPTION_TEMPLATE = `    <label><input type="radio" name="format" value="{{VALUE}}"{{CHECKED}}> {{LABEL}}</label>`;

export const METADATA_TEMPLATE = `<h3>Metadata</h3>
<p><strong>Source:</strong> {{SOURCE}}</p>
<p><strong>URL:</strong> <a href="{{URL}}" target="_blank" rel="noopener">{{URL}}</a></p>
<p><strong>Title:</strong> {{TITLE}}</p>
<p><strong>Author:</strong> {{AUTHOR}}</p>
<p><strong>Thumbnail:</strong> {{THUMBNAIL}}</p>
<p>Reminder: this app never downloads audio from these services.</p>
<p><a href="/">Back</a></p>`;

export const THUMBNAIL_TEMPLATE = `<img src="{{SRC}}" alt="thumbnail">`;

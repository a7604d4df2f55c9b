import { escapeHtml } from "../shared/utils/html";

export type UploadPageView =
  | { kind: "form"; candidateName: string; submitUrl: string }
  | { kind: "not_requested"; candidateName: string }
  | { kind: "already_submitted"; candidateName: string; verified: boolean }
  | { kind: "not_found" };

const PAGE_STYLE = `
  body { font-family: -apple-system, "Segoe UI", Roboto, sans-serif; background: #f4f6fb; color: #1f2933; margin: 0; }
  main { max-width: 520px; margin: 48px auto; background: #fff; border-radius: 12px; padding: 32px; box-shadow: 0 4px 18px rgba(15, 23, 42, 0.08); }
  h1 { font-size: 22px; margin: 0 0 12px; }
  p { line-height: 1.5; }
  label { display: block; font-weight: 600; margin: 18px 0 6px; }
  input[type="file"] { width: 100%; }
  button { margin-top: 24px; width: 100%; padding: 12px; border: 0; border-radius: 8px; background: #2563eb; color: #fff; font-size: 16px; cursor: pointer; }
  button:disabled { background: #93a3c4; cursor: default; }
  .hint { color: #52606d; font-size: 14px; }
  .status { margin-top: 18px; font-weight: 600; }
  .status.error { color: #b91c1c; }
  .status.ok { color: #15803d; }
`;

const FORM_SCRIPT = `
  (function () {
    var form = document.getElementById("upload-form");
    var status = document.getElementById("upload-status");
    var button = form.querySelector("button");
    form.addEventListener("submit", function (event) {
      event.preventDefault();
      button.disabled = true;
      status.className = "status";
      status.textContent = "Uploading...";
      fetch(form.getAttribute("data-submit-url"), { method: "POST", body: new FormData(form) })
        .then(function (response) {
          return response.json().then(function (body) { return { ok: response.ok, body: body }; });
        })
        .then(function (result) {
          if (result.ok) {
            status.className = "status ok";
            status.textContent = "Thank you. Your documents were submitted successfully.";
            form.reset();
            return;
          }
          status.className = "status error";
          status.textContent = (result.body && result.body.error) || "Upload failed.";
          button.disabled = false;
        })
        .catch(function () {
          status.className = "status error";
          status.textContent = "Upload failed. Please check your connection and try again.";
          button.disabled = false;
        });
    });
  })();
`;

export function renderUploadPage(view: UploadPageView): string {
  if (view.kind === "not_found") {
    return renderShell(
      "Link not found",
      `<h1>Link not found</h1>
      <p>This upload link is not valid. Please check the link in your email.</p>`,
    );
  }

  const name = escapeHtml(view.candidateName || "Candidate");

  if (view.kind === "already_submitted") {
    const detail = view.verified
      ? "Your documents have already been verified. No further action is needed."
      : "Your documents have already been submitted and are being reviewed.";
    return renderShell(
      "Documents received",
      `<h1>Thank you, ${name}</h1>
      <p>${detail}</p>`,
    );
  }

  if (view.kind === "not_requested") {
    return renderShell(
      "No documents requested",
      `<h1>Hello, ${name}</h1>
      <p>No documents have been requested from you yet.</p>`,
    );
  }

  return renderShell(
    "Upload identity documents",
    `<h1>Hello, ${name}</h1>
    <p>Please upload your PAN Card and Aadhaar Card to complete your verification.</p>
    <p class="hint">Accepted formats: JPG, PNG or PDF.</p>
    <form id="upload-form" data-submit-url="${escapeHtml(view.submitUrl)}" enctype="multipart/form-data">
      <label for="pan_card">PAN Card</label>
      <input id="pan_card" name="pan_card" type="file" accept=".jpg,.jpeg,.png,.pdf" required>
      <label for="aadhaar_card">Aadhaar Card</label>
      <input id="aadhaar_card" name="aadhaar_card" type="file" accept=".jpg,.jpeg,.png,.pdf" required>
      <button type="submit">Submit documents</button>
      <div id="upload-status" class="status" role="status"></div>
    </form>
    <script>${FORM_SCRIPT}</script>`,
  );
}

function renderShell(title: string, body: string): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <style>${PAGE_STYLE}</style>
</head>
<body>
  <main>
    ${body}
  </main>
</body>
</html>`;
}

// Runs as soon as the parser reaches it, before anything else in <head>.
// Cookie format: access=1|<ISO expiry>; a value without "|" never expires.
export const GATE_SCRIPT = `(function () {
  function hasValidCookie() {
    const cookies = document.cookie.split("; ").map(c => c.trim());
    const accessCookie = cookies.find(c => c.startsWith("access="));
    if (!accessCookie) return false;
    const parts = accessCookie.split("=");
    if (parts.length < 2) return false;
    // cookie format: access=1|<ISO expiry>
    const val = parts[1];
    const match = val.match(/\\|(.*)$/);
    if (!match) return true; // if no expiry encoded, assume permanent
    const expiry = new Date(match[1]);
    return expiry > new Date();
  }
  if (!hasValidCookie()) {
    window.location.replace("/sorry.html");
  }
})();`;

// Appended at the end of <head>; re-checks every 10-25s while the page is open.
export const SCHEDULER_SCRIPT = `function recheckCookie() {
  function hasValidCookie() {
    const cookies = document.cookie.split("; ").map(c => c.trim());
    const accessCookie = cookies.find(c => c.startsWith("access="));
    if (!accessCookie) return false;
    const parts = accessCookie.split("=");
    if (parts.length < 2) return false;
    const val = parts[1];
    const match = val.match(/\\|(.*)$/);
    if (!match) return true;
    const expiry = new Date(match[1]);
    return expiry > new Date();
  }
  if (!hasValidCookie()) {
    window.location.replace("/sorry.html");
  }
}
function scheduleRecheck() {
  const next = Math.floor(Math.random() * (25000 - 10000 + 1)) + 10000;
  setTimeout(() => {
    recheckCookie();
    scheduleRecheck();
  }, next);
}
scheduleRecheck();`;

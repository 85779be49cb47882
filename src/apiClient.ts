async function readJSON(res: Response): Promise<unknown> {
  try { return await res.json(); } catch { return null; }
}

export async function getJSON(path: string): Promise<{ res: Response; data: unknown }> {
  const res = await fetch(path, { headers: { Accept: 'application/json' } });
  return { res, data: await readJSON(res) };
}

export async function postJSON(path: string, body: unknown): Promise<{ res: Response; data: unknown }> {
  const res = await fetch(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });
  return { res, data: await readJSON(res) };
}

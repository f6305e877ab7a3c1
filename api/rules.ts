import { listRules } from "../src/catalog";

export const config = {
  runtime: "nodejs",
};

export default function handler(): Response {
  return new Response(
    JSON.stringify(
      {
        rules: listRules(),
      },
      null,
      2,
    ),
    {
      headers: {
        "content-type": "application/json; charset=utf-8",
        "cache-control": "public, max-age=60",
      },
    },
  );
}

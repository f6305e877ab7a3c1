import rulesHandler from "../../../../api/rules";

export const runtime = "nodejs";

export async function GET(): Promise<Response> {
    return rulesHandler();
}

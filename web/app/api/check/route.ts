import checkHandler from "../../../../api/check";

export const runtime = "nodejs";

export async function OPTIONS(request: Request): Promise<Response> {
    return checkHandler(request);
}

export async function POST(request: Request): Promise<Response> {
    return checkHandler(request);
}

/**
 * Express-style response instance.
 */
export type JsonResponse = {
    status: (code: number) => JsonResponse;
    setHeader: (name: string, value: string) => JsonResponse;
    json: (body: unknown) => void;
};

/**
 * Writes a JSON response to the provided Express response object.
 *
 * @param response - Express-style response instance.
 * @param body - Response body to serialize as JSON.
 * @param code - HTTP status code to return.
 * @param contentType - Media type written to the Content-Type header.
 */
export function writeJson(
    response: JsonResponse,
    body: unknown,
    code = 200,
    contentType = "application/json",
): void {
    response.setHeader("Content-Type", contentType);
    response.status(code).json(body);
}

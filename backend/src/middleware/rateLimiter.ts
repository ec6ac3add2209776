import rateLimit from "express-rate-limit";
import { CALLER_ID_HEADER } from "./callerIdentity";

// Requests arrive through the chat adapter's reverse proxy.
const trustProxyValidation = { validate: { trustProxy: false } };

// Keyed per caller when the adapter forwards one, per IP otherwise.
export const roomCommandLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    max: 600,
    message: { error: "Too many commands, please slow down." },
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => req.header(CALLER_ID_HEADER)?.trim() || req.ip || "unknown",
    ...trustProxyValidation,
});

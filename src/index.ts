import {
    HttpException,
    BodyRejection,
    BodyAlreadyConsumed,
    RouteConflictError,
    DuplicatePatternError,
    RouterSealedError,
    DispatchError,
    type BodyRejectionKind
} from './core/HttpException.js'

import {
    Request,
    METHODS,
    DEFAULT_LIMITS,
    isMethod,
    type Method,
    type Limits,
    type Logger,
    type PathParams,
    type RequestParts,
    type RequestInit
} from './core/http.js'

import { Body, type BodySource } from './core/Body.js'
import { HeaderMap } from './core/HeaderMap.js'
import { Response, type ResponseParts } from './core/Response.js'
import { StatusCode } from './core/StatusCode.js'
import { Router, type RouterOptions } from './core/Router.js'

import {
    Json,
    intoResponse,
    isResponder,
    type Infallible,
    type IntoResponse,
    type IntoResponseParts,
    type PartsResult,
    type Responder,
    type ResponseTuple
} from './response/IntoResponse.js'

import {
    partExtractor,
    requestExtractor,
    type PartExtractor,
    type RequestExtractor,
    type Extractor,
    type ExtractorList,
    type ExtractedArgs
} from './extract/Extractor.js'
import { method, headers, params, uri, header, bytes, text, json } from './extract/builtin.js'

import { handler, HandlerService, type Handler, type HandlerFn, type HandlerResult, type Service } from './routing/handler.js'
import {
    MethodRouter,
    get, post, put, patch, del, head, options, trace, connect, any
} from './routing/MethodRouter.js'
import { PathMatcher, type PathMatch } from './routing/PathMatcher.js'

export {
    Router,
    MethodRouter,
    PathMatcher,

    Request,
    Response,
    Body,
    HeaderMap,
    StatusCode,
    METHODS,
    DEFAULT_LIMITS,
    isMethod,

    Json,
    intoResponse,
    isResponder,

    handler,
    HandlerService,
    partExtractor,
    requestExtractor,
    method, headers, params, uri, header, bytes, text, json,

    get, post, put, patch, del, head, options, trace, connect, any,

    HttpException,
    BodyRejection,
    BodyAlreadyConsumed,
    RouteConflictError,
    DuplicatePatternError,
    RouterSealedError,
    DispatchError,

    type RouterOptions,
    type Method,
    type Limits,
    type Logger,
    type PathParams,
    type RequestParts,
    type RequestInit,
    type BodySource,
    type ResponseParts,
    type BodyRejectionKind,

    type Infallible,
    type IntoResponse,
    type IntoResponseParts,
    type PartsResult,
    type Responder,
    type ResponseTuple,

    type PartExtractor,
    type RequestExtractor,
    type Extractor,
    type ExtractorList,
    type ExtractedArgs,

    type Handler,
    type HandlerFn,
    type HandlerResult,
    type Service,
    type PathMatch
}
